import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "cellar-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("parses quoted values and ignores comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# local overrides\nSECRETS_SECRET_ID='app/dev'\nAWS_ENDPOINT=\"http://localhost:4566\"\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({
      SECRETS_SECRET_ID: "app/dev",
      AWS_ENDPOINT: "http://localhost:4566",
    })
  })

  it("names itself after the file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false }).name).toBe(
      "dotenv:.env.local",
    )
  })

  it("loads nothing for a missing optional file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects for a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("does not modify process.env", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "CELLAR_DOTENV_ONLY=1\n")

    await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(process.env.CELLAR_DOTENV_ONLY).toBeUndefined()
  })
})

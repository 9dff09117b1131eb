import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "SECRETS_SECRET_ID=app/prod\nLOG_LEVEL=warn\n")
  },
  make: (cwd) => new DotenvSource({ file: ".env", required: true, cwd }),
  expected: { SECRETS_SECRET_ID: "app/prod", LOG_LEVEL: "warn" },
})

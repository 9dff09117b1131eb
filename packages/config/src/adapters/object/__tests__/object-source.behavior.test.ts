import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  it("returns a copy of the given values", async () => {
    const values = { LOG_PRETTY: true }
    const source = new ObjectSource(values)

    const loaded = await source.load()

    expect(loaded).toEqual({ LOG_PRETTY: true })
    expect(loaded).not.toBe(values)
  })

  it("labels its provenance", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
    expect(new ObjectSource({}, "cli").name).toBe("object:cli")
  })
})

import { requireSecret } from "../../../core/secret-result"
import { EmptySecretSource } from "../empty-secret-source"

describe("EmptySecretSource", () => {
  const source = new EmptySecretSource()

  it.each([[""], ["!"], ["!api-key"], ["api-key"], ["!!nested"]])(
    "returns an empty string for %j",
    (key) => {
      expect(source.getByKey(key)).toEqual({ kind: "found", value: "" })
    },
  )

  it("works with requireSecret", () => {
    expect(requireSecret(source, "!anything")).toBe("")
  })
})

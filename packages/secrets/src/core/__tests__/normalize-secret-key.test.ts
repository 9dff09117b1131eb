import { DEFAULT_SECRET_KEY_POLICY, normalizeSecretKey } from "../normalize-secret-key"

describe("normalizeSecretKey", () => {
  it("defaults to strip-marker", () => {
    expect(DEFAULT_SECRET_KEY_POLICY).toBe("strip-marker")
    expect(normalizeSecretKey("db-pass")).toBe("db-pass")
  })

  describe.each(["strip-marker", "legacy"] as const)("%s", (policy) => {
    it("strips a leading marker", () => {
      expect(normalizeSecretKey("!db-pass", policy)).toBe("db-pass")
    })

    it("strips the marker only once", () => {
      expect(normalizeSecretKey("!!db-pass", policy)).toBe("!db-pass")
    })

    it("turns a bare marker into the empty key", () => {
      expect(normalizeSecretKey("!", policy)).toBe("")
    })

    it("leaves markers after the first character alone", () => {
      expect(normalizeSecretKey("!db!pass", policy)).toBe("db!pass")
    })

    it("does not trim or fold case", () => {
      expect(normalizeSecretKey("! DB-Pass ", policy)).toBe(" DB-Pass ")
    })
  })

  describe("keys without the marker", () => {
    it("are used unchanged under strip-marker", () => {
      expect(normalizeSecretKey("db-pass", "strip-marker")).toBe("db-pass")
      expect(normalizeSecretKey("", "strip-marker")).toBe("")
      expect(normalizeSecretKey(" !x", "strip-marker")).toBe(" !x")
    })

    it("become the empty key under legacy", () => {
      expect(normalizeSecretKey("db-pass", "legacy")).toBe("")
      expect(normalizeSecretKey("", "legacy")).toBe("")
      expect(normalizeSecretKey(" !x", "legacy")).toBe("")
    })
  })
})

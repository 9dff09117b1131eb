import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("request failed", {
        code: "request_failure",
        context: { secretId: "app/prod" },
        isRetryable: true,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "request_failure",
        message: "request failed",
        context: { secretId: "app/prod" },
        isRetryable: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("omits the stack unless asked", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("serializes the cause chain recursively", () => {
      const root = new Error("socket hang up")
      const middle = new BaseError("middle", { code: "mid", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("mid")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("socket hang up")
    })
  })

  describe("standard Error instances", () => {
    it("uses code unknown and keeps the subclass name", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized.name).toBe("TypeError")
      expect(serialized.code).toBe("unknown")
      expect(serialized.isRetryable).toBe(false)
    })

    it("follows Error.cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("something went wrong")
      expect(serialized.context).toEqual({})
    })

    it("keeps other values under context.value", () => {
      const serialized = serializeError({ status: 503 })

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: { status: 503 } })
    })

    it("handles null", () => {
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})

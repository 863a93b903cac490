import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("applies defaults", () => {
      const err = new BaseError("Something went wrong", { code: "test_error" })

      expect(err.message).toBe("Something went wrong")
      expect(err.code).toBe("test_error")
      expect(err.name).toBe("BaseError")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
      expect(err.cause).toBeUndefined()
    })

    it("uses the subclass name", () => {
      class LoadError extends BaseError<"load"> {}

      expect(new LoadError("x", { code: "load" }).name).toBe("LoadError")
    })

    it("keeps cause and flags", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", {
        code: "wrapped",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { scope: "items" }
      const err = new BaseError("test", { code: "test", context })

      context.scope = "changed"

      expect(err.context).toEqual({ scope: "items" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })
  })

  describe("serialization", () => {
    it("serializes all fields without stack by default", () => {
      const err = new BaseError("test error", {
        code: "test",
        context: { path: "/etc/cfg/items.json" },
        isRetryable: true,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "test",
        message: "test error",
        context: { path: "/etc/cfg/items.json" },
        isRetryable: true,
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("toJSON() matches serializeError()", () => {
      const err = new BaseError("x", { code: "x" })

      expect(JSON.parse(JSON.stringify(err))).toEqual(serializeError(err))
    })

    it("includes stack when requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("serializes the cause chain recursively", () => {
      const root = new Error("root cause")
      const outer = new BaseError("outer", { code: "outer", cause: root })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("unknown")
      expect(serialized.cause?.message).toBe("root cause")
      expect(serialized.cause?.isOperational).toBe(false)
    })

    it("wraps non-error values", () => {
      expect(serializeError("boom")).toEqual({
        name: "NonErrorThrown",
        code: "unknown",
        message: "boom",
        context: { value: "boom" },
        isRetryable: false,
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})

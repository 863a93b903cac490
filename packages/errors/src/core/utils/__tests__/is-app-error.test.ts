import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  it("accepts BaseError and its subclasses", () => {
    class TimeoutError extends BaseError<"timeout"> {
      constructor() {
        super("timed out", { code: "timeout", isRetryable: true })
      }
    }

    expect(isAppError(new BaseError("test", { code: "test" }))).toBe(true)
    expect(isAppError(new TimeoutError())).toBe(true)
  })

  it("accepts a structurally complete object", () => {
    const lookalike = {
      name: "RemoteError",
      message: "remote said no",
      code: "remote",
      context: { host: "config.internal" },
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(),
    }

    expect(isAppError(lookalike)).toBe(true)
  })

  it("rejects non-objects and plain errors", () => {
    expect(isAppError(null)).toBe(false)
    expect(isAppError(undefined)).toBe(false)
    expect(isAppError("boom")).toBe(false)
    expect(isAppError(new Error("plain"))).toBe(false)
  })

  it("rejects an object with an invalid timestamp", () => {
    const broken = {
      name: "E",
      message: "m",
      code: "c",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date("not a date"),
    }

    expect(isAppError(broken)).toBe(false)
  })
})

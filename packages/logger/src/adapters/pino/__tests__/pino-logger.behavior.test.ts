import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"
import { BaseError } from "@snapcfg/errors"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  const parsed = () => lines.map((line) => JSON.parse(line))

  return { lines, parsed, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON lines carrying the bound context", () => {
    const { parsed, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "orders" })

    logger.info("Configuration refreshed", { checksum: "abc" })

    const [payload] = parsed()

    expect(payload).toMatchObject({
      msg: "Configuration refreshed",
      service: "orders",
      checksum: "abc",
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() shares the base sink and level", () => {
    const { parsed, destination } = makeLineDestination()

    const child = createPinoLogger({ destination }, { level: "warn" }).child({
      module: "config-client",
    })

    child.info("ignored")
    child.warn("logged")

    expect(parsed()).toHaveLength(1)
    expect(parsed()[0]).toMatchObject({ msg: "logged", module: "config-client" })
  })

  it("serializes err through the error serializer", () => {
    const { parsed, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    const err = new BaseError("Failed to read scope file", {
      code: "scope_file_unreadable",
      cause: new Error("ENOENT"),
    })

    logger.error("Failed to refresh configuration", { err })

    const payload = parsed()[0]

    expect(payload.err.type).toBe("BaseError")
    expect(payload.err.message).toBe("Failed to read scope file")
    expect(payload.err.code).toBe("scope_file_unreadable")
    expect(payload.err.isRetryable).toBe(false)
  })
})

import { z } from "zod"
import type { ConfigClientOptions } from "../core/client"
import { ConfigError } from "../core/config-error"
import { DEFAULT_CONTENT_TYPE } from "../core/content-type"
import { namerNames } from "../core/namers"
import { parseDuration } from "./duration"

const scopeList = z.union([
  z.array(z.string()),
  z.string().transform((s) =>
    s
      .split(",")
      .map((scope) => scope.trim())
      .filter((scope) => scope !== ""),
  ),
])

const duration = z
  .union([z.number().int().nonnegative(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === "number") return value

    const ms = parseDuration(value)
    if (ms === undefined) {
      ctx.issues.push({
        code: "custom",
        message: `Invalid duration "${value}", expected e.g. 250ms, 30s, 5m or 1h`,
        input: value,
      })
      return z.NEVER
    }
    return ms
  })

export const clientOptionsSchema = z.object({
  source: z.string().trim().min(1),
  contentType: z.string().trim().default(DEFAULT_CONTENT_TYPE),
  scopes: scopeList,
  namer: z.enum(namerNames).optional(),
  refreshInterval: duration.default(0),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
})

export type RawClientOptions = z.input<typeof clientOptionsSchema>

/**
 * Validates raw client options (from a file, the environment or code).
 *
 * @throws {ConfigError} `invalid_options` with one line per problem
 */
export function parseClientOptions(raw: unknown): ConfigClientOptions {
  const result = clientOptionsSchema.safeParse(raw)

  if (!result.success) {
    throw ConfigError.invalidOptions(z.prettifyError(result.error))
  }

  const { refreshInterval, ...rest } = result.data

  return { ...rest, refreshIntervalMs: refreshInterval }
}

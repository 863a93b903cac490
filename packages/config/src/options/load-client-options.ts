import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigClientOptions } from "../core/client"
import { parseClientOptions } from "./client-options"

export type LoadClientOptionsInput = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** @default "CONFIG_" */
  prefix?: string
  /**
   * Optional .env file read before the environment, which wins on conflicts.
   * Relative to `cwd`. A missing file is ignored.
   */
  dotenvFile?: string
  /** @default process.cwd() */
  cwd?: string
}

const keys = {
  SOURCE: "source",
  CONTENT_TYPE: "contentType",
  SCOPES: "scopes",
  NAMER: "namer",
  REFRESH_INTERVAL: "refreshInterval",
  REQUEST_TIMEOUT_MS: "requestTimeoutMs",
} as const

function withPrefix(
  vars: Record<string, string | undefined>,
  prefix: string,
): Record<string, string | undefined> {
  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(vars)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}

async function readDotenv(file: string, cwd: string): Promise<Record<string, string>> {
  const filePath = path.resolve(cwd, file)

  try {
    return parse(await fs.readFile(filePath, "utf-8"))
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {}
    throw err
  }
}

/**
 * Builds client options from `<prefix>SOURCE`, `<prefix>CONTENT_TYPE`,
 * `<prefix>SCOPES`, `<prefix>NAMER`, `<prefix>REFRESH_INTERVAL` and
 * `<prefix>REQUEST_TIMEOUT_MS`.
 *
 * @example
 * ```ts
 * // CONFIG_SOURCE=https://cfg.internal/app CONFIG_SCOPES=limits,flags
 * const options = await loadClientOptions({ dotenvFile: ".env" })
 * ```
 */
export async function loadClientOptions(
  input: LoadClientOptionsInput = {},
): Promise<ConfigClientOptions> {
  const prefix = input.prefix ?? "CONFIG_"
  const cwd = input.cwd ?? process.cwd()

  const fromFile = input.dotenvFile ? await readDotenv(input.dotenvFile, cwd) : {}
  const vars = withPrefix({ ...fromFile, ...(input.env ?? process.env) }, prefix)

  const raw: Record<string, string> = {}
  for (const [envKey, optionKey] of Object.entries(keys)) {
    const value = vars[envKey]
    if (value !== undefined && value !== "") raw[optionKey] = value
  }

  return parseClientOptions(raw)
}

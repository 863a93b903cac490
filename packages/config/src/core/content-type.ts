import { parse as parseToml, stringify as stringifyToml } from "smol-toml"
import { parse as parseYaml, stringify as stringifyYaml } from "yaml"
import type { Codec } from "../ports/codec"
import { ConfigError } from "./config-error"

export const DEFAULT_CONTENT_TYPE = "application/json"

const utf8 = new TextDecoder("utf-8")
const encoder = new TextEncoder()

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

const json: Codec = {
  mediaType: "application/json",
  ext: "json",
  encode: (value) => encoder.encode(JSON.stringify(value)),
  decode: (data) => JSON.parse(utf8.decode(data)),
}

const yaml: Codec = {
  mediaType: "application/yaml",
  ext: "yaml",
  encode: (value) => encoder.encode(stringifyYaml(value)),
  decode: (data) => parseYaml(utf8.decode(data)),
}

const toml: Codec = {
  mediaType: "application/toml",
  ext: "toml",
  encode: (value) => {
    // TOML documents are always tables
    if (!isTable(value)) throw new TypeError("TOML can only encode a table")
    return encoder.encode(stringifyToml(value))
  },
  decode: (data) => parseToml(utf8.decode(data)),
}

const codecs: ReadonlyMap<string, Codec> = new Map([
  [json.mediaType, json],
  [yaml.mediaType, yaml],
  [toml.mediaType, toml],
])

const extensions: ReadonlyMap<string, Codec> = new Map([
  ["json", json],
  ["yaml", yaml],
  ["yml", yaml],
  ["toml", toml],
])

/** Codec a well-known file extension belongs to, if any. */
export function codecForExtension(ext: string): Codec | undefined {
  return extensions.get(ext.toLowerCase())
}

/** Strips parameters and case from a media type, e.g. `"Application/JSON; charset=utf-8"`. */
export function essence(contentType: string): string {
  const [type = ""] = contentType.split(";", 1)
  return type.trim().toLowerCase()
}

/**
 * Resolves a declared content type to its codec. An empty or missing type
 * means JSON.
 *
 * @throws {ConfigError} `unsupported_content_type` for anything else
 */
export function resolveContentType(contentType?: string): Codec {
  const key = essence(contentType ?? "")
  if (key === "") return json

  const codec = codecs.get(key)
  if (!codec) throw ConfigError.unsupportedContentType(contentType ?? "")

  return codec
}

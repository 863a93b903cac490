import path from "node:path"
import { ConfigError } from "./config-error"

export type SourceDescriptor =
  | { kind: "http"; url: string }
  | { kind: "directory"; dir: string; ext?: string }

/**
 * Classifies a source string.
 *
 * - `http://` / `https://` go to the HTTP loader
 * - `file://<dir>?ext=<ext>` is a directory (the URL path), `ext` overriding the codec's extension
 *   for file names only; decoding always follows the declared content type, and
 *   the directory loader rejects a well-known extension of another format
 *   (`?ext=yaml` under JSON) with `invalid_source`
 * - anything else is a directory path resolved against `cwd`
 */
export function parseSource(source: string, cwd: string = process.cwd()): SourceDescriptor {
  const trimmed = source.trim()
  if (trimmed === "") throw ConfigError.invalidSource(source)

  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(trimmed)?.[1]?.toLowerCase()

  if (scheme === "http" || scheme === "https") {
    return { kind: "http", url: trimmed }
  }

  if (scheme === "file") {
    let url: URL
    try {
      url = new URL(trimmed)
    } catch (err) {
      throw ConfigError.invalidSource(source, err)
    }

    const dir = decodeURIComponent(url.pathname)
    const ext = url.searchParams.get("ext")?.replace(/^\./, "")
    return ext ? { kind: "directory", dir, ext } : { kind: "directory", dir }
  }

  if (scheme !== undefined) throw ConfigError.invalidSource(source)

  return { kind: "directory", dir: path.resolve(cwd, trimmed) }
}

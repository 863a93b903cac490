import type { Milliseconds } from "@snapcfg/clock"
import type { Scopes } from "../core/scopes"
import type { Codec } from "./codec"

/** Maps a scope name and file extension to a file name. */
export type Namer = (scope: string, ext: string) => string

/** Caller-supplied replacement for the built-in loaders. */
export type FetchFn = (request: FetchRequest) => Promise<Uint8Array | string>

export type FetchRequest = {
  /** Declared content type, as configured (may be empty). */
  contentType: string
  scopes: Scopes
  signal?: AbortSignal
}

/**
 * Everything a loader needs for one load. Built fresh per call.
 */
export type LoadRequest = {
  source: string
  /** Declared content type, as configured (may be empty). */
  contentType: string
  codec: Codec
  /** Normalized, concrete (non-wildcard, non-empty) scopes. */
  scopes: Scopes
  namer?: Namer
  /** Checksum of the snapshot currently served, if the source reported one. */
  checksum?: string
  /** `false` until a snapshot has been published. */
  loaded: boolean
  timeoutMs?: Milliseconds
  signal?: AbortSignal
}

export type LoadedPayload =
  | { kind: "unchanged" }
  | { kind: "changed"; data: Uint8Array; checksum?: string }

/**
 * Produces the raw document for a load. Loaders never touch the snapshot
 * store; the caller decides what to do with the payload.
 */
export interface Loader {
  /** Human-readable name for logs, e.g. "http", "directory:/etc/cfg". */
  readonly name: string

  load(request: LoadRequest): Promise<LoadedPayload>
}

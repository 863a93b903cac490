import type { Milliseconds } from "@snapcfg/clock"
import { DirectoryLoader } from "../adapters/directory/directory-loader"
import { FetchLoader } from "../adapters/fetch/fetch-loader"
import { HttpLoader } from "../adapters/http/http-loader"
import type { Hub } from "../ports/hub"
import type { FetchFn, Loader, Namer } from "../ports/loader"
import { ConfigError } from "./config-error"
import { resolveContentType } from "./content-type"
import { Scopes } from "./scopes"
import { SnapshotStore } from "./snapshot-store"
import { parseSource } from "./source"

export type LoadOptions = {
  /**
   * Where to load from. Ignored when `fetch` is set.
   *
   * @example "https://cfg.internal/app", "file:///etc/app?ext=yaml", "./config"
   */
  source?: string
  /** @default "application/json" */
  contentType?: string
  scopes: Iterable<string>
  /** Replaces both built-in loaders. */
  fetch?: FetchFn
  /** Scope file naming for directory sources. @default `${scope}.${ext}` */
  namer?: Namer
  /** Per-request timeout for HTTP sources. */
  timeoutMs?: Milliseconds
}

export type ConfigDeps = {
  /** Base for relative directory sources. @default process.cwd() */
  cwd?: string
}

/**
 * Loads configuration documents into a {@link SnapshotStore}.
 *
 * `load` resolves to `true` when a new snapshot was published and `false` when
 * there was nothing to do (no scopes, or the remote reported the same
 * checksum). Failures reject and leave the current snapshot in place.
 */
export class Config<H extends Hub> {
  private readonly store: SnapshotStore<H>

  constructor(
    createHub: () => H,
    private readonly deps: ConfigDeps = {},
  ) {
    this.store = new SnapshotStore(createHub)
  }

  get loaded(): boolean {
    return this.store.loaded
  }

  get checksum(): string | undefined {
    return this.store.checksum
  }

  latest(): H {
    return this.store.latest()
  }

  async load(options: LoadOptions, signal?: AbortSignal): Promise<boolean> {
    const scopes = Scopes.normalize(options.scopes)
    if (scopes.isEmpty) return false
    if (scopes.isWildcard) throw ConfigError.unresolvedWildcard()

    const codec = resolveContentType(options.contentType)
    const loader = this.loaderFor(options)

    const payload = await loader.load({
      source: options.source ?? loader.name,
      contentType: options.contentType ?? "",
      codec,
      scopes,
      namer: options.namer,
      checksum: this.store.checksum,
      loaded: this.store.loaded,
      timeoutMs: options.timeoutMs,
      signal,
    })

    if (payload.kind === "unchanged") return false

    this.store.parse(payload.data, codec.decode, payload.checksum)
    return true
  }

  private loaderFor(options: LoadOptions): Loader {
    if (options.fetch) return new FetchLoader(options.fetch)

    const source = parseSource(options.source ?? "", this.deps.cwd)
    if (source.kind === "http") return new HttpLoader(source.url)

    return new DirectoryLoader(source)
  }
}

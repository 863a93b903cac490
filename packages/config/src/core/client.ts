import { type Clock, type Milliseconds, SystemClock } from "@snapcfg/clock"
import { isAppError } from "@snapcfg/errors"
import type { Logger } from "@snapcfg/logger"
import { type TaskHandle, tick } from "@snapcfg/task"
import type { Hub } from "../ports/hub"
import type { FetchFn, Namer } from "../ports/loader"
import { Config, type LoadOptions } from "./config"
import { ConfigError } from "./config-error"
import { createNamer, type NamerName } from "./namers"
import { Scopes } from "./scopes"

export type ConfigClientOptions = {
  source?: string
  contentType?: string
  scopes: readonly string[]
  namer?: NamerName
  /** `0` or unset disables periodic refresh. */
  refreshIntervalMs?: Milliseconds
  requestTimeoutMs?: Milliseconds
  fetch?: FetchFn
}

export type ConfigClientDeps = {
  logger: Logger
  clock?: Clock
  /** Base for relative directory sources. @default process.cwd() */
  cwd?: string
}

/**
 * Keeps a configuration snapshot current.
 *
 * `init` performs the first load and must succeed before `start` schedules
 * periodic refreshes. Scheduled failures are logged and the previous
 * snapshot keeps serving.
 *
 * @example
 * ```ts
 * const client = new ConfigClient(options, () => new AppHub(), { logger })
 * await client.init()
 * client.start()
 * // ...
 * client.latest().limits
 * await client.shutdown(AbortSignal.timeout(5_000))
 * ```
 */
export class ConfigClient<H extends Hub> {
  private readonly config: Config<H>
  private readonly logger: Logger
  private readonly clock: Clock
  private readonly source: string
  private namer: Namer | undefined
  private initialized = false
  private handle: TaskHandle | undefined
  private stopped = false
  private inFlight: Promise<boolean> | undefined

  constructor(
    private readonly options: ConfigClientOptions,
    createHub: () => H,
    deps: ConfigClientDeps,
  ) {
    this.config = new Config(createHub, { cwd: deps.cwd })
    this.clock = deps.clock ?? new SystemClock()
    this.source = options.fetch ? "fetch" : (options.source ?? "")
    this.logger = deps.logger.child({
      module: "config-client",
      source: this.source,
      scopes: Scopes.normalize(options.scopes).toString(),
    })
  }

  get running(): boolean {
    return this.handle !== undefined && !this.handle.done
  }

  latest(): H {
    return this.config.latest()
  }

  /** Resolves the scope namer and performs the first load. Throws on failure. */
  async init(signal?: AbortSignal): Promise<void> {
    this.namer = this.options.namer ? createNamer(this.options.namer) : undefined

    await this.refresh(signal)
    this.initialized = true
  }

  /**
   * Starts the periodic refresh. A no-op when no interval is configured or
   * when already started.
   *
   * @throws {ConfigError} `not_initialized` before a successful `init`
   */
  start(signal?: AbortSignal): void {
    if (!this.initialized) throw ConfigError.notInitialized()
    if (this.handle) return

    const intervalMs = this.options.refreshIntervalMs ?? 0
    if (intervalMs <= 0) {
      this.logger.info("Periodic refresh disabled")
      return
    }

    this.handle = tick((s) => this.scheduledRefresh(s), intervalMs, {
      signal,
      clock: this.clock,
    })
    this.logger.info("Config client started", { intervalMs })
  }

  /**
   * Loads once. Calls made while a load is in flight share its result.
   */
  refresh(signal?: AbortSignal): Promise<boolean> {
    if (this.inFlight) return this.inFlight

    const load = this.load(signal).finally(() => {
      this.inFlight = undefined
    })
    this.inFlight = load

    return load
  }

  /** Stops the periodic refresh and waits for it, at most until `signal` aborts. */
  async shutdown(signal?: AbortSignal): Promise<void> {
    const handle = this.handle
    if (!handle || this.stopped) return

    this.stopped = true
    handle.cancel()
    await handle.join(signal)

    this.logger.info("Config client stopped", { completed: handle.done })
  }

  private async load(signal?: AbortSignal): Promise<boolean> {
    const startedAt = this.clock.nowMs()
    const options: LoadOptions = {
      source: this.options.source,
      contentType: this.options.contentType,
      scopes: this.options.scopes,
      fetch: this.options.fetch,
      namer: this.namer,
      timeoutMs: this.options.requestTimeoutMs,
    }

    const changed = await this.config.load(options, signal)
    const durationMs = this.clock.nowMs() - startedAt

    if (changed) {
      this.logger.info("Configuration updated", {
        durationMs,
        ...(this.config.checksum !== undefined && { checksum: this.config.checksum }),
      })
    } else {
      this.logger.debug("Configuration unchanged", { durationMs })
    }

    return changed
  }

  private async scheduledRefresh(signal: AbortSignal): Promise<void> {
    try {
      await this.refresh(signal)
    } catch (err) {
      this.logger.error("Failed to refresh configuration", {
        err,
        source: this.source,
        ...(isAppError(err) && { code: err.code, retryable: err.isRetryable }),
      })
    }
  }
}

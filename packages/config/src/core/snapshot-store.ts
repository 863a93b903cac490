import type { Decoder } from "../ports/codec"
import type { Hub } from "../ports/hub"
import { ConfigError } from "./config-error"

type Snapshot<H> = Readonly<{ hub: H; checksum: string | undefined }>

/**
 * Holds the hub currently served to readers.
 *
 * Each `parse` fills a fresh hub and publishes it together with its checksum
 * in one assignment, so readers see either the old snapshot or the new one.
 */
export class SnapshotStore<H extends Hub> {
  private current: Snapshot<H> | undefined

  constructor(private readonly createHub: () => H) {}

  get loaded(): boolean {
    return this.current !== undefined
  }

  get checksum(): string | undefined {
    return this.current?.checksum
  }

  /**
   * @throws {ConfigError} `not_loaded` before the first successful parse
   */
  latest(): H {
    if (!this.current) throw ConfigError.notLoaded()
    return this.current.hub
  }

  /**
   * Parses `data` into a new hub and swaps it in. On failure the previous
   * snapshot and checksum stay in place.
   *
   * @throws {ConfigError} `decode_failed`
   */
  parse(data: Uint8Array, decode: Decoder, checksum?: string): H {
    const hub = this.createHub()

    try {
      hub.parse(data, decode)
    } catch (err) {
      throw ConfigError.decodeFailed(err)
    }

    this.current = Object.freeze({ hub, checksum: checksum || undefined })
    return hub
  }
}

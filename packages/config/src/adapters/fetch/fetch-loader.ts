import { ConfigError } from "../../core/config-error"
import type { FetchFn, LoadedPayload, Loader, LoadRequest } from "../../ports/loader"

const encoder = new TextEncoder()

/** Delegates loading to a caller-supplied function. Every load counts as a change. */
export class FetchLoader implements Loader {
  readonly name = "fetch"

  constructor(private readonly fetchFn: FetchFn) {}

  async load(request: LoadRequest): Promise<LoadedPayload> {
    let out: Uint8Array | string
    try {
      out = await this.fetchFn({
        contentType: request.contentType,
        scopes: request.scopes,
        signal: request.signal,
      })
    } catch (err) {
      throw ConfigError.fetchFailed(err)
    }

    return { kind: "changed", data: typeof out === "string" ? encoder.encode(out) : out }
  }
}

import axios, { type AxiosResponse } from "axios"
import { ConfigError } from "../../core/config-error"
import { DEFAULT_CONTENT_TYPE } from "../../core/content-type"
import type { LoadedPayload, Loader, LoadRequest } from "../../ports/loader"

export const CHECKSUM_HEADER = "x-checksum"

function headerValue(value: unknown): string {
  const first: unknown = Array.isArray(value) ? value[0] : value
  return typeof first === "string" ? first.trim() : ""
}

/**
 * Fetches the configuration document over HTTP.
 *
 * The request is a GET whose body is the comma-joined scope list. The checksum
 * of the snapshot currently served goes out in `X-Checksum`; when the server
 * answers with the same checksum the load reports "unchanged" and nothing is
 * decoded.
 */
export class HttpLoader implements Loader {
  readonly name: string
  private readonly url: URL

  constructor(url: string) {
    try {
      this.url = new URL(url)
    } catch (err) {
      throw ConfigError.invalidSource(url, err)
    }
    this.name = `http:${this.url.origin}${this.url.pathname}`
  }

  async load(request: LoadRequest): Promise<LoadedPayload> {
    const headers: Record<string, string> = {
      "content-type": request.contentType || DEFAULT_CONTENT_TYPE,
    }
    if (request.checksum) headers[CHECKSUM_HEADER] = request.checksum

    let res: AxiosResponse<ArrayBuffer>
    try {
      res = await axios.request<ArrayBuffer>({
        method: "GET",
        url: this.url.href,
        data: request.scopes.toString(),
        headers,
        timeout: request.timeoutMs ?? 0,
        signal: request.signal,
        responseType: "arraybuffer",
        proxy: false,
        validateStatus: () => true,
      })
    } catch (err) {
      throw ConfigError.requestFailed(this.url.href, err)
    }

    if (res.status < 200 || res.status > 299) {
      throw ConfigError.httpStatus({ url: this.url.href, status: res.status })
    }

    const data = new Uint8Array(res.data)
    const checksum = headerValue(res.headers[CHECKSUM_HEADER])

    // a store that was never loaded always takes the payload
    if (request.loaded && checksum !== "" && checksum === request.checksum) {
      return { kind: "unchanged" }
    }

    return checksum === "" ? { kind: "changed", data } : { kind: "changed", data, checksum }
  }
}

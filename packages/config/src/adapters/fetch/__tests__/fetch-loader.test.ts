import { ConfigError } from "../../../core/config-error"
import { resolveContentType } from "../../../core/content-type"
import { Scopes } from "../../../core/scopes"
import type { FetchFn, LoadRequest } from "../../../ports/loader"
import { FetchLoader } from "../fetch-loader"

function request(overrides: Partial<LoadRequest> = {}): LoadRequest {
  return {
    source: "fetch",
    contentType: "application/yaml",
    codec: resolveContentType("application/yaml"),
    scopes: Scopes.normalize(["limits"]),
    loaded: true,
    checksum: "v1",
    ...overrides,
  }
}

describe("FetchLoader", () => {
  it("passes the declared type, scopes and signal to the function", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => "limits: {}\n")
    const signal = new AbortController().signal
    const req = request({ signal })

    await new FetchLoader(fetchFn).load(req)

    expect(fetchFn).toHaveBeenCalledWith({
      contentType: "application/yaml",
      scopes: req.scopes,
      signal,
    })
  })

  it("encodes string results as UTF-8", async () => {
    const payload = await new FetchLoader(async () => "name: ü\n").load(request())

    expect(payload).toEqual({
      kind: "changed",
      data: new TextEncoder().encode("name: ü\n"),
    })
  })

  it("passes bytes through and always reports a change", async () => {
    const data = new Uint8Array([123, 125])

    const payload = await new FetchLoader(async () => data).load(request())

    expect(payload).toEqual({ kind: "changed", data })
  })

  it("wraps failures in a retryable ConfigError", async () => {
    const boom = new Error("boom")

    const loading = new FetchLoader(async () => {
      throw boom
    }).load(request())

    await expect(loading).rejects.toBeInstanceOf(ConfigError)
    await expect(loading).rejects.toMatchObject({
      code: "fetch_failed",
      isRetryable: true,
      cause: boom,
    })
  })
})

import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { resolveContentType } from "../../../core/content-type"
import { createNamer } from "../../../core/namers"
import { Scopes } from "../../../core/scopes"
import type { LoadRequest } from "../../../ports/loader"
import { DirectoryLoader } from "../directory-loader"

function request(overrides: Partial<LoadRequest> = {}): LoadRequest {
  return {
    source: "test",
    contentType: "",
    codec: resolveContentType(),
    scopes: Scopes.normalize(["a", "b"]),
    loaded: false,
    ...overrides,
  }
}

async function loadedDocument(loader: DirectoryLoader, req: LoadRequest): Promise<unknown> {
  const payload = await loader.load(req)
  if (payload.kind !== "changed") throw new Error("expected a changed payload")

  return req.codec.decode(payload.data)
}

describe("DirectoryLoader", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "directory-loader-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true })
  })

  it("wraps every scope file in one keyed document", async () => {
    await fs.writeFile(path.join(dir, "a.json"), '{"x":1}')
    await fs.writeFile(path.join(dir, "b.json"), "[true]")

    const doc = await loadedDocument(new DirectoryLoader({ dir }), request())

    expect(doc).toEqual({ a: { x: 1 }, b: [true] })
  })

  it("keeps a scope named __proto__ as a key of the document", async () => {
    await fs.writeFile(path.join(dir, "__proto__.json"), '{"x":1}')

    const doc = await loadedDocument(
      new DirectoryLoader({ dir }),
      request({ scopes: Scopes.normalize(["__proto__"]) }),
    )

    if (typeof doc !== "object" || doc === null) throw new Error("expected an object")
    expect(Object.keys(doc)).toEqual(["__proto__"])
    expect(Object.getOwnPropertyDescriptor(doc, "__proto__")?.value).toEqual({ x: 1 })
  })

  it("fails the whole load when one file is missing", async () => {
    await fs.writeFile(path.join(dir, "a.json"), '{"x":1}')

    await expect(new DirectoryLoader({ dir }).load(request())).rejects.toMatchObject({
      code: "scope_file_unreadable",
      isRetryable: true,
      context: { scope: "b", path: path.join(dir, "b.json") },
    })
  })

  it("reports the malformed file", async () => {
    await fs.writeFile(path.join(dir, "a.json"), '{"x":1}')
    await fs.writeFile(path.join(dir, "b.json"), "{")

    await expect(new DirectoryLoader({ dir }).load(request())).rejects.toMatchObject({
      code: "decode_failed",
      context: { scope: "b", path: path.join(dir, "b.json") },
    })
  })

  it("re-encodes the document in the declared format", async () => {
    await fs.writeFile(path.join(dir, "a.toml"), "x = 1\n")
    await fs.writeFile(path.join(dir, "b.toml"), 'name = "beta"\n')

    const req = request({ codec: resolveContentType("application/toml") })
    const payload = await new DirectoryLoader({ dir }).load(req)
    if (payload.kind !== "changed") throw new Error("expected a changed payload")

    expect(new TextDecoder().decode(payload.data)).toContain("[a]")
    expect(req.codec.decode(payload.data)).toEqual({ a: { x: 1 }, b: { name: "beta" } })
  })

  it("uses the namer to find files", async () => {
    await fs.writeFile(path.join(dir, "feature_flags.yaml"), "beta: true\n")

    const doc = await loadedDocument(
      new DirectoryLoader({ dir }),
      request({
        codec: resolveContentType("application/yaml"),
        scopes: Scopes.normalize(["featureFlags"]),
        namer: createNamer("snake_case"),
      }),
    )

    expect(doc).toEqual({ featureFlags: { beta: true } })
  })

  it("lets an explicit extension override the codec's", async () => {
    await fs.writeFile(path.join(dir, "a.yml"), "x: 1\n")

    const doc = await loadedDocument(
      new DirectoryLoader({ dir, ext: "yml" }),
      request({
        codec: resolveContentType("application/yaml"),
        scopes: Scopes.normalize(["a"]),
      }),
    )

    expect(doc).toEqual({ a: { x: 1 } })
  })

  it("rejects an extension that names another format", async () => {
    await fs.writeFile(path.join(dir, "a.yaml"), "x: 1\n")

    await expect(
      new DirectoryLoader({ dir, ext: "yaml" }).load(request({ scopes: Scopes.normalize(["a"]) })),
    ).rejects.toMatchObject({
      code: "invalid_source",
      context: { dir, ext: "yaml", mediaType: "application/json" },
    })
  })

  it("accepts an extension no format claims", async () => {
    await fs.writeFile(path.join(dir, "a.conf"), '{"x":1}')

    const doc = await loadedDocument(
      new DirectoryLoader({ dir, ext: "conf" }),
      request({ scopes: Scopes.normalize(["a"]) }),
    )

    expect(doc).toEqual({ a: { x: 1 } })
  })

  it("stops when the signal is already aborted", async () => {
    await fs.writeFile(path.join(dir, "a.json"), "{}")
    await fs.writeFile(path.join(dir, "b.json"), "{}")

    const controller = new AbortController()
    controller.abort()

    await expect(
      new DirectoryLoader({ dir }).load(request({ signal: controller.signal })),
    ).rejects.toMatchObject({ code: "scope_file_unreadable" })
  })
})

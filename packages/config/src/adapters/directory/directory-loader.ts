import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../../core/config-error"
import { codecForExtension } from "../../core/content-type"
import { defaultNamer } from "../../core/namers"
import type { Codec } from "../../ports/codec"
import type { LoadedPayload, Loader, LoadRequest } from "../../ports/loader"

export type DirectoryLoaderOptions = {
  dir: string
  /** Overrides the file extension derived from the content type. */
  ext?: string
}

type ScopeFile = { scope: string; path: string; content: Buffer }

/**
 * Reads one file per scope from a directory and hands the hub a single
 * document `{ [scope]: contents }` in the declared format.
 *
 * All-or-nothing: one unreadable or malformed file fails the whole load.
 */
export class DirectoryLoader implements Loader {
  readonly name: string

  constructor(private readonly opts: DirectoryLoaderOptions) {
    this.name = `directory:${opts.dir}`
  }

  async load(request: LoadRequest): Promise<LoadedPayload> {
    const { codec, scopes, signal } = request
    const ext = this.opts.ext ?? codec.ext

    const extCodec = codecForExtension(ext)
    if (extCodec && extCodec !== codec) {
      throw ConfigError.extensionMismatch({ dir: this.opts.dir, ext, mediaType: codec.mediaType })
    }
    const namer = request.namer ?? defaultNamer

    const files = await Promise.all(
      scopes.values.map((scope) => this.read(scope, path.join(this.opts.dir, namer(scope, ext)), signal)),
    )

    // fromEntries defines own keys, so a scope named "__proto__" stays a key
    const envelope = Object.fromEntries(files.map((file) => [file.scope, this.decode(file, codec)]))

    return { kind: "changed", data: codec.encode(envelope) }
  }

  private decode(file: ScopeFile, codec: Codec): unknown {
    try {
      return codec.decode(file.content)
    } catch (err) {
      throw ConfigError.decodeFailed(err, { scope: file.scope, path: file.path })
    }
  }

  private async read(scope: string, filePath: string, signal?: AbortSignal): Promise<ScopeFile> {
    try {
      const content = await fs.readFile(filePath, { signal })
      return { scope, path: filePath, content }
    } catch (err) {
      throw ConfigError.scopeFileUnreadable({ scope, path: filePath, cause: err })
    }
  }
}

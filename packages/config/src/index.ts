export { DirectoryLoader, type DirectoryLoaderOptions } from "./adapters/directory/directory-loader"
export { FetchLoader } from "./adapters/fetch/fetch-loader"
export { CHECKSUM_HEADER, HttpLoader } from "./adapters/http/http-loader"
export { ConfigClient, type ConfigClientDeps, type ConfigClientOptions } from "./core/client"
export { Config, type ConfigDeps, type LoadOptions } from "./core/config"
export { ConfigError, type ConfigErrorCode } from "./core/config-error"
export {
  codecForExtension,
  DEFAULT_CONTENT_TYPE,
  essence,
  resolveContentType,
} from "./core/content-type"
export { createNamer, defaultNamer, type NamerName, namerNames, words } from "./core/namers"
export { Scopes, WILDCARD } from "./core/scopes"
export { SnapshotStore } from "./core/snapshot-store"
export { parseSource, type SourceDescriptor } from "./core/source"
export {
  clientOptionsSchema,
  parseClientOptions,
  type RawClientOptions,
} from "./options/client-options"
export { parseDuration } from "./options/duration"
export { type LoadClientOptionsInput, loadClientOptions } from "./options/load-client-options"
export type { Codec, Decoder, Encoder } from "./ports/codec"
export type { Hub } from "./ports/hub"
export type {
  FetchFn,
  FetchRequest,
  LoadedPayload,
  Loader,
  LoadRequest,
  Namer,
} from "./ports/loader"

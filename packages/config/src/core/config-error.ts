import { BaseError } from "@snapcfg/errors"

export type ConfigErrorCode =
  | "unsupported_content_type"
  | "unresolved_wildcard"
  | "invalid_source"
  | "invalid_options"
  | "not_loaded"
  | "not_initialized"
  | "decode_failed"
  | "scope_file_unreadable"
  | "http_status"
  | "request_failed"
  | "fetch_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static unsupportedContentType(contentType: string): ConfigError {
    return new ConfigError(`Unsupported content type "${contentType}"`, {
      code: "unsupported_content_type",
      context: { contentType },
    })
  }

  static unresolvedWildcard(): ConfigError {
    return new ConfigError("Wildcard scope must be resolved to concrete scopes before loading", {
      code: "unresolved_wildcard",
    })
  }

  static invalidSource(source: string, cause?: unknown): ConfigError {
    return new ConfigError(`Invalid configuration source "${source}"`, {
      code: "invalid_source",
      context: { source },
      cause,
    })
  }

  static extensionMismatch(input: { dir: string; ext: string; mediaType: string }): ConfigError {
    return new ConfigError(
      `Extension ".${input.ext}" does not match content type "${input.mediaType}"`,
      {
        code: "invalid_source",
        context: { dir: input.dir, ext: input.ext, mediaType: input.mediaType },
      },
    )
  }

  static invalidOptions(details: string): ConfigError {
    return new ConfigError(`Invalid client options:\n${details}`, {
      code: "invalid_options",
    })
  }

  static notLoaded(): ConfigError {
    return new ConfigError("No configuration snapshot has been loaded yet", {
      code: "not_loaded",
      isOperational: false,
    })
  }

  static notInitialized(): ConfigError {
    return new ConfigError("Client must be initialized before it is started", {
      code: "not_initialized",
      isOperational: false,
    })
  }

  static decodeFailed(cause: unknown, context?: { scope: string; path: string }): ConfigError {
    return new ConfigError("Failed to decode configuration payload", {
      code: "decode_failed",
      ...(context && { context }),
      cause,
    })
  }

  static scopeFileUnreadable(input: { scope: string; path: string; cause: unknown }): ConfigError {
    return new ConfigError(`Cannot read file for scope "${input.scope}"`, {
      code: "scope_file_unreadable",
      context: { scope: input.scope, path: input.path },
      cause: input.cause,
      isRetryable: true,
    })
  }

  static httpStatus(input: { url: string; status: number }): ConfigError {
    return new ConfigError(`Configuration request failed with status ${input.status}`, {
      code: "http_status",
      context: { url: input.url, status: input.status },
      isRetryable: true,
    })
  }

  static fetchFailed(cause: unknown): ConfigError {
    return new ConfigError("Custom fetch function failed", {
      code: "fetch_failed",
      cause,
      isRetryable: true,
    })
  }

  static requestFailed(url: string, cause: unknown): ConfigError {
    return new ConfigError("Configuration request failed", {
      code: "request_failed",
      context: { url },
      cause,
      isRetryable: true,
    })
  }
}

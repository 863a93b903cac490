export type LogContext = {
  service: string
  module: string
  env: string

  /** Configuration source descriptor (URL or directory). */
  source: string
  /** Comma-joined scope list of the load being reported. */
  scopes: string
  checksum: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

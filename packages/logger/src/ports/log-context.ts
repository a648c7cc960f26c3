/**
 * Well-known fields attached to log entries emitted around database programs.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Backend name, e.g. "memory" or "redis". */
  backend: string
  /** Bucket (key prefix) the backend is bound to. */
  bucket: string

  /** Command kind being dispatched, e.g. "get" or "increment_counter". */
  operation: string
  key: string
  batchIndex: number
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

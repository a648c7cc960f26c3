export type DbErrorCode =
  | "not_connected"
  | "not_found"
  | "already_exists"
  | "version_conflict"
  | "decode_error"
  | "backend_failure"
  | "batch_item_failure"
  | "invalid_argument"

/**
 * Structured metadata attached to errors (keys, versions, indices).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * JSON-safe error shape for logging and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

/**
 * Contract shared by every database error.
 */
export interface AppError extends Error {
  readonly code: DbErrorCode
  readonly context: ErrorContext
  /** Whether retrying the same operation might succeed. */
  readonly isRetryable: boolean
  /** `false` marks a programmer error rather than a runtime condition. */
  readonly isOperational: boolean
  readonly timestamp: Date
  toJSON(): SerializedError
}

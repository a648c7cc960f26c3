import type { SerializedError } from "../../ports/db-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

type CodedError = Error & {
  readonly code: string
  readonly context: Readonly<Record<string, unknown>>
  readonly isOperational: boolean
  readonly timestamp: Date
}

function isCodedError(err: Error): err is CodedError {
  return (
    "code" in err &&
    typeof err.code === "string" &&
    "timestamp" in err &&
    err.timestamp instanceof Date &&
    "isOperational" in err &&
    typeof err.isOperational === "boolean" &&
    "context" in err &&
    typeof err.context === "object" &&
    err.context !== null
  )
}

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Handles:
 * - DbError instances (code, context, nested causes)
 * - Standard Error instances (code defaults to "UNKNOWN")
 * - Non-Error thrown values (wrapped with context)
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const coded = isCodedError(err)
    return {
      name: err.name,
      code: coded ? err.code : "UNKNOWN",
      message: err.message,
      context: coded ? { ...err.context } : {},
      isOperational: coded ? err.isOperational : false,
      timestamp: (coded ? err.timestamp : new Date()).toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "UNKNOWN",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

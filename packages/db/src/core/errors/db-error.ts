import type {
  AppError,
  DbErrorCode,
  ErrorContext,
  SerializedError,
} from "../../ports/db-error"
import type { DocKey, DocVersion } from "../../ports/document"
import { serializeError } from "./serialize-error"

export type DbErrorOptions<C extends DbErrorCode = DbErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class DbError<C extends DbErrorCode = DbErrorCode>
  extends Error
  implements AppError
{
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: DbErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = "DbError"
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DbError)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export function notConnected(): DbError<"not_connected"> {
  return new DbError("Not connected to the database", {
    code: "not_connected",
    isRetryable: true,
  })
}

export function notFound(key: DocKey): DbError<"not_found"> {
  return new DbError(`Document not found: ${key}`, {
    code: "not_found",
    context: { key },
  })
}

export function alreadyExists(key: DocKey): DbError<"already_exists"> {
  return new DbError(`Document already exists: ${key}`, {
    code: "already_exists",
    context: { key },
  })
}

export function versionConflict(
  key: DocKey,
  expectedVersion: DocVersion,
  actualVersion?: DocVersion,
): DbError<"version_conflict"> {
  return new DbError(`Version conflict on ${key}`, {
    code: "version_conflict",
    context: {
      key,
      expectedVersion,
      ...(actualVersion !== undefined && { actualVersion }),
    },
    isRetryable: true,
  })
}

export function decodeError(
  key: DocKey,
  detail: string,
  cause?: unknown,
): DbError<"decode_error"> {
  return new DbError(`Cannot decode ${key}: ${detail}`, {
    code: "decode_error",
    context: { key },
    ...(cause !== undefined && { cause }),
  })
}

export function backendFailure(
  message: string,
  cause?: unknown,
  context?: ErrorContext,
): DbError<"backend_failure"> {
  return new DbError(message, {
    code: "backend_failure",
    isRetryable: true,
    ...(cause !== undefined && { cause }),
    ...(context !== undefined && { context }),
  })
}

export function batchItemFailure(
  index: number,
  cause: DbError,
): DbError<"batch_item_failure"> {
  return new DbError(`Batch item ${index} failed: ${cause.message}`, {
    code: "batch_item_failure",
    context: { index, causeCode: cause.code },
    cause,
  })
}

export function invalidKey(value: string): DbError<"invalid_argument"> {
  return new DbError("Document key must not be empty", {
    code: "invalid_argument",
    context: { key: value },
    isOperational: false,
  })
}

export function invalidDelta(delta: number): DbError<"invalid_argument"> {
  return new DbError(`Counter delta must be a safe integer, got ${delta}`, {
    code: "invalid_argument",
    context: { delta },
    isOperational: false,
  })
}

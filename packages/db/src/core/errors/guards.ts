import type { DbErrorCode } from "../../ports/db-error"
import { DbError } from "./db-error"

export function isDbError(value: unknown): value is DbError {
  return value instanceof DbError
}

export function hasCode<C extends DbErrorCode>(
  value: unknown,
  code: C,
): value is DbError<C> {
  return isDbError(value) && value.code === code
}

/**
 * Normalise a thrown value. Anything that is not already a `DbError` becomes a
 * non-operational `backend_failure` wrapping it.
 */
export function toDbError(value: unknown): DbError {
  if (isDbError(value)) return value

  const message = value instanceof Error ? value.message : String(value)
  return new DbError(`Unexpected failure: ${message}`, {
    code: "backend_failure",
    cause: value,
    isOperational: false,
  })
}

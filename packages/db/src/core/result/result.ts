import type { DbResult, Err, Ok } from "../../ports/result"
import type { DbError } from "../errors/db-error"

export function ok<T>(value: T): Ok<T> {
  return { kind: "ok", value }
}

export function err(error: DbError): Err {
  return { kind: "err", error }
}

export function isOk<T>(result: DbResult<T>): result is Ok<T> {
  return result.kind === "ok"
}

export function isErr<T>(result: DbResult<T>): result is Err {
  return result.kind === "err"
}

export function mapResult<T, U>(
  result: DbResult<T>,
  f: (value: T) => U,
): DbResult<U> {
  return result.kind === "ok" ? ok(f(result.value)) : result
}

export function mapError<T>(
  result: DbResult<T>,
  f: (error: DbError) => DbError,
): DbResult<T> {
  return result.kind === "err" ? err(f(result.error)) : result
}

export function andThenResult<T, U>(
  result: DbResult<T>,
  f: (value: T) => DbResult<U>,
): DbResult<U> {
  return result.kind === "ok" ? f(result.value) : result
}

/**
 * Recover from a failure, e.g. treat `not_found` as a default value.
 */
export function orElse<T>(
  result: DbResult<T>,
  f: (error: DbError) => DbResult<T>,
): DbResult<T> {
  return result.kind === "err" ? f(result.error) : result
}

/**
 * Return the value or throw the error.
 */
export function unwrap<T>(result: DbResult<T>): T {
  if (result.kind === "err") throw result.error
  return result.value
}

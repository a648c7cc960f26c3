import type { DbError } from "../core/errors/db-error"

export type Ok<T> = {
  readonly kind: "ok"
  readonly value: T
}

export type Err = {
  readonly kind: "err"
  readonly error: DbError
}

/**
 * Outcome of a database operation.
 *
 * @remarks
 * Command-level operations never throw; every failure is an `Err` carrying
 * one of the {@link DbErrorCode} kinds.
 */
export type DbResult<T> = Ok<T> | Err

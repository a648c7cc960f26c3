import type { DbError } from "../core/errors/db-error"
import type { DocKey, RawContent } from "./document"
import type { Program } from "./program"
import type { DbResult } from "./result"

/**
 * One document to create: a program producing its key, and its content.
 */
export type BatchEntry = {
  readonly key: Program<DocKey>
  readonly content: RawContent
}

/**
 * An input item. An `Err` item is already known to have failed
 * (e.g. its content could not be produced) and is recorded as such.
 */
export type BatchItem = DbResult<BatchEntry>

export type BatchSource = Iterable<BatchItem> | AsyncIterable<BatchItem>

/**
 * Called after each failed item; `false` stops the batch.
 */
export type ContinuePredicate = (cause: DbError) => boolean

export type BatchFailure = {
  /** Position in the original input sequence. */
  readonly index: number
  readonly cause: DbError
}

export type BatchOutcome = {
  readonly succeeded: readonly number[]
  readonly failed: readonly BatchFailure[]
}

import type { BatchFailure, BatchOutcome } from "../../ports/batch"
import type { DbResult } from "../../ports/result"
import { batchItemFailure, type DbError } from "../errors/db-error"
import { err, ok } from "../result/result"

export type BatchStatus = "empty" | "succeeded" | "failed" | "partial"

export function emptyOutcome(): BatchOutcome {
  return { succeeded: [], failed: [] }
}

export function succeededAt(index: number): BatchOutcome {
  return { succeeded: [index], failed: [] }
}

export function failedAt(index: number, cause: DbError): BatchOutcome {
  return { succeeded: [], failed: [{ index, cause }] }
}

/**
 * Associative combination: succeeded indices form a set union, failures
 * concatenate and a failure whose index is already present is dropped.
 */
export function combineOutcomes(a: BatchOutcome, b: BatchOutcome): BatchOutcome {
  const succeeded = new Set(a.succeeded)
  const failedIndices = new Set(a.failed.map((failure) => failure.index))

  return {
    succeeded: [...a.succeeded, ...b.succeeded.filter((index) => !succeeded.has(index))],
    failed: [
      ...a.failed,
      ...b.failed.filter((failure: BatchFailure) => !failedIndices.has(failure.index)),
    ],
  }
}

export function combineAll(outcomes: Iterable<BatchOutcome>): BatchOutcome {
  let combined = emptyOutcome()
  for (const outcome of outcomes) combined = combineOutcomes(combined, outcome)
  return combined
}

export function outcomeStatus(outcome: BatchOutcome): BatchStatus {
  const succeeded = outcome.succeeded.length > 0
  const failed = outcome.failed.length > 0
  if (succeeded && failed) return "partial"
  if (failed) return "failed"
  return succeeded ? "succeeded" : "empty"
}

/**
 * Succeed with the created indices, or fail with the first failed item as a
 * `batch_item_failure`.
 */
export function requireAllSucceeded(outcome: BatchOutcome): DbResult<readonly number[]> {
  const [first] = outcome.failed
  if (first === undefined) return ok(outcome.succeeded)
  return err(batchItemFailure(first.index, first.cause))
}

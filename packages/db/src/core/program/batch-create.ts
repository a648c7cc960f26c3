import type { BatchOutcome, BatchSource, ContinuePredicate } from "../../ports/batch"
import type { Program } from "../../ports/program"

/**
 * Create many documents as one command. See `runBatch` for the semantics.
 */
export function batchCreateDocs(
  items: BatchSource,
  shouldContinue: ContinuePredicate,
): Program<BatchOutcome> {
  return {
    kind: "suspend",
    instruction: {
      kind: "batch_create",
      items,
      shouldContinue,
      resume: (outcome) => outcome,
    },
  }
}

export const continueOnFailure: ContinuePredicate = () => true

export const stopOnFailure: ContinuePredicate = () => false

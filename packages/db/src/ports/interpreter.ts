import type { BatchOutcome, BatchSource, ContinuePredicate } from "./batch"
import type { DocumentBackend } from "./document-backend"
import type { Program } from "./program"
import type { DbResult } from "./result"

/**
 * Executes programs against one backend. Holds no state between calls.
 */
export interface ProgramInterpreter {
  readonly backend: DocumentBackend

  /**
   * Run `program`. Never rejects: every failure resolves as an `Err`.
   */
  execute<T>(program: Program<T>): Promise<DbResult<T>>

  /**
   * Like `execute`, but resolves with the value and rejects with the `DbError`.
   */
  run<T>(program: Program<T>): Promise<T>

  runBatch(items: BatchSource, shouldContinue: ContinuePredicate): Promise<BatchOutcome>
}

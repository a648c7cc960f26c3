import type { Logger } from "@docket/logger"
import type { BatchItem, BatchOutcome, BatchSource, ContinuePredicate } from "../../ports/batch"
import type { Program } from "../../ports/program"
import type { DbResult } from "../../ports/result"
import { createDoc } from "../program/program"
import { combineOutcomes, emptyOutcome, failedAt, succeededAt } from "./batch-outcome"

export type ExecuteProgram = <T>(program: Program<T>) => Promise<DbResult<T>>

export type BatchEngineDeps = {
  execute: ExecuteProgram
  logger?: Logger
}

async function runItem(
  execute: ExecuteProgram,
  item: BatchItem,
  index: number,
): Promise<BatchOutcome> {
  if (item.kind === "err") return failedAt(index, item.error)

  const key = await execute(item.value.key)
  if (key.kind === "err") return failedAt(index, key.error)

  const created = await execute(createDoc(key.value, item.value.content))
  return created.kind === "ok" ? succeededAt(index) : failedAt(index, created.error)
}

/**
 * Create documents one at a time, pulling `items` lazily.
 *
 * @remarks
 * - Every failure is recorded before `shouldContinue` sees it, so an aborted
 *   batch still reports the failure that stopped it.
 * - When `shouldContinue` returns `false`, no further item is pulled.
 * - Items are never retried and never run concurrently.
 */
export async function runBatch(
  deps: BatchEngineDeps,
  items: BatchSource,
  shouldContinue: ContinuePredicate,
): Promise<BatchOutcome> {
  let outcome = emptyOutcome()
  let index = 0

  for await (const item of items) {
    const step = await runItem(deps.execute, item, index)
    outcome = combineOutcomes(outcome, step)

    const [failure] = step.failed
    if (failure !== undefined) {
      deps.logger?.warn("Batch item failed", {
        operation: "batch_create",
        batchIndex: index,
        err: failure.cause,
      })
      if (!shouldContinue(failure.cause)) {
        deps.logger?.info("Batch stopped", { operation: "batch_create", batchIndex: index })
        break
      }
    }
    index += 1
  }

  return outcome
}

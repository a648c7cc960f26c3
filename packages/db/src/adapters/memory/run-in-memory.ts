import type { Logger } from "@docket/logger"
import { createInterpreter } from "../../core/interpreter/interpreter"
import type { Program } from "../../ports/program"
import type { DbResult } from "../../ports/result"
import { MemoryDocumentBackend } from "./memory-document-backend"
import { emptySnapshot, type MemorySnapshot } from "./memory-snapshot"

export type InMemoryRun<T> = {
  readonly result: DbResult<T>
  readonly snapshot: MemorySnapshot
}

/**
 * Execute `program` against a fresh in-memory backend seeded from `snapshot`.
 * The input snapshot is left untouched.
 */
export async function runInMemory<T>(
  program: Program<T>,
  snapshot: MemorySnapshot = emptySnapshot(),
  logger?: Logger,
): Promise<InMemoryRun<T>> {
  const backend = new MemoryDocumentBackend({ initial: snapshot })
  const interpreter = createInterpreter({ backend, ...(logger !== undefined && { logger }) })
  const result = await interpreter.execute(program)
  return { result, snapshot: backend.snapshot() }
}

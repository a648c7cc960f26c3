import type { DocKey, DocumentValue, RawContent } from "../../ports/document"

/**
 * Immutable state of an in-memory database.
 *
 * @remarks
 * `sequence` is the last version number handed out; the next write gets
 * `sequence + 1`. Replaying a program from the same snapshot therefore yields
 * the same versions.
 */
export type MemorySnapshot = {
  readonly documents: ReadonlyMap<DocKey, DocumentValue>
  readonly sequence: number
}

export function emptySnapshot(): MemorySnapshot {
  return { documents: new Map(), sequence: 0 }
}

/**
 * Seed documents with versions "1", "2", ... in iteration order.
 */
export function snapshotOf(entries: Iterable<readonly [DocKey, RawContent]>): MemorySnapshot {
  const documents = new Map<DocKey, DocumentValue>()
  let sequence = 0
  for (const [key, content] of entries) {
    sequence += 1
    documents.set(key, { content, version: String(sequence) })
  }
  return { documents, sequence }
}

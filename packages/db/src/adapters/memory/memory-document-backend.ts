import { formatCounter, parseCounter } from "../../core/counter/counter"
import {
  alreadyExists,
  backendFailure,
  decodeError,
  notFound,
  versionConflict,
} from "../../core/errors/db-error"
import { err, ok } from "../../core/result/result"
import {
  type DocKey,
  type DocumentValue,
  type DocVersion,
  type RawContent,
  UNCONDITIONAL_VERSION,
} from "../../ports/document"
import type { DocumentBackend } from "../../ports/document-backend"
import type { DbResult } from "../../ports/result"
import { emptySnapshot, type MemorySnapshot } from "./memory-snapshot"

export type MemoryDocumentBackendOptions = {
  initial?: MemorySnapshot
  /** Reject writes of new keys beyond this many documents. */
  maxEntries?: number
}

/**
 * Process-local backend for tests and demos. Always connected.
 *
 * @remarks
 * The initial snapshot is copied; `snapshot()` hands out copies too, so callers
 * never share the live map.
 */
export class MemoryDocumentBackend implements DocumentBackend {
  readonly name = "memory"

  private readonly documents: Map<DocKey, DocumentValue>
  private sequence: number

  public constructor(private readonly opts: MemoryDocumentBackendOptions = {}) {
    const initial = opts.initial ?? emptySnapshot()
    this.documents = new Map(initial.documents)
    this.sequence = initial.sequence
  }

  isConnected(): boolean {
    return true
  }

  snapshot(): MemorySnapshot {
    return { documents: new Map(this.documents), sequence: this.sequence }
  }

  async get(key: DocKey): Promise<DbResult<DocumentValue>> {
    const doc = this.documents.get(key)
    return doc === undefined ? err(notFound(key)) : ok(doc)
  }

  async create(key: DocKey, content: RawContent): Promise<DbResult<DocumentValue>> {
    if (this.documents.has(key)) return err(alreadyExists(key))
    if (this.isFull()) return err(this.fullError(key))
    return ok(this.write(key, content))
  }

  async update(
    key: DocKey,
    content: RawContent,
    version: DocVersion,
  ): Promise<DbResult<DocumentValue>> {
    const current = this.documents.get(key)
    if (current === undefined) return err(notFound(key))
    if (version !== UNCONDITIONAL_VERSION && version !== current.version) {
      return err(versionConflict(key, version, current.version))
    }
    return ok(this.write(key, content))
  }

  async remove(key: DocKey): Promise<DbResult<void>> {
    if (!this.documents.delete(key)) return err(notFound(key))
    return ok(undefined)
  }

  async getCounter(key: DocKey): Promise<DbResult<number>> {
    const doc = this.documents.get(key)
    if (doc === undefined) return err(notFound(key))

    const value = parseCounter(doc.content)
    return value === undefined ? err(decodeError(key, "counter is not an integer")) : ok(value)
  }

  async incrementCounter(key: DocKey, delta: number): Promise<DbResult<number>> {
    const doc = this.documents.get(key)

    let next = delta
    if (doc !== undefined) {
      const current = parseCounter(doc.content)
      if (current === undefined) return err(decodeError(key, "counter is not an integer"))
      next = current + delta
    } else if (this.isFull()) {
      return err(this.fullError(key))
    }

    if (!Number.isSafeInteger(next)) {
      return err(decodeError(key, "counter would exceed the safe integer range"))
    }

    this.write(key, formatCounter(next))
    return ok(next)
  }

  private write(key: DocKey, content: RawContent): DocumentValue {
    this.sequence += 1
    const doc: DocumentValue = { content, version: String(this.sequence) }
    this.documents.set(key, doc)
    return doc
  }

  private isFull(): boolean {
    return this.opts.maxEntries !== undefined && this.documents.size >= this.opts.maxEntries
  }

  private fullError(key: DocKey) {
    return backendFailure(`Memory backend is full (${this.opts.maxEntries} documents)`, undefined, {
      key,
    })
  }
}

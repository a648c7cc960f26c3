import type { DocKey, DocumentValue, DocVersion, RawContent } from "./document"
import type { DbResult } from "./result"

/**
 * Storage capabilities an interpreter needs.
 *
 * @remarks
 * - Every method resolves with a result; none rejects for expected failures.
 * - `create` fails with `already_exists` when the key is present.
 * - `update` fails with `not_found` when the key is absent and with
 *   `version_conflict` when `version` is stale.
 * - Counters share the document key space; their content is decimal text.
 */
export interface DocumentBackend {
  /** Short name used in logs, e.g. "memory" or "redis". */
  readonly name: string

  /**
   * `false` means commands must not be dispatched.
   */
  isConnected(): boolean

  get(key: DocKey): Promise<DbResult<DocumentValue>>

  create(key: DocKey, content: RawContent): Promise<DbResult<DocumentValue>>

  update(
    key: DocKey,
    content: RawContent,
    version: DocVersion,
  ): Promise<DbResult<DocumentValue>>

  remove(key: DocKey): Promise<DbResult<void>>

  getCounter(key: DocKey): Promise<DbResult<number>>

  /**
   * Atomically add `delta`. An absent counter starts at `delta`.
   */
  incrementCounter(key: DocKey, delta: number): Promise<DbResult<number>>
}

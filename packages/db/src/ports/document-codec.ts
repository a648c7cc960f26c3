import type { DocKey, RawContent } from "./document"
import type { Program } from "./program"
import type { DbResult } from "./result"

/**
 * Maps a domain type onto stored documents.
 *
 * @remarks
 * `deserialize` reports malformed content as a `decode_error` result.
 * `keyFor` returns a program so keys may come from counters.
 *
 * @example
 * ```ts
 * const invoices: DocumentCodec<Invoice> = {
 *   serialize: (invoice) => JSON.stringify(invoice),
 *   deserialize: (content) => parseInvoice(content),
 *   keyFor: (invoice) => pure(`invoice:${invoice.number}`),
 * }
 * ```
 */
export interface DocumentCodec<T> {
  serialize(value: T): RawContent
  deserialize(content: RawContent): DbResult<T>
  keyFor(value: T): Program<DocKey>
}

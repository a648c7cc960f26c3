/**
 * Identifies a document. Never empty.
 *
 * @remarks
 * Keys are typically namespaced strings (e.g. "user:42", "invoice:2024:7").
 */
export type DocKey = string

/**
 * Serialized document payload, usually JSON text.
 *
 * @remarks
 * Backends store and return it verbatim. Interpreting it is the job of a
 * {@link DocumentCodec}.
 */
export type RawContent = string

/**
 * Opaque version token assigned by the backend on every successful write.
 *
 * @remarks
 * Compare tokens for equality only. Their format is backend-specific.
 */
export type DocVersion = string

/**
 * Passed to an update to replace the stored content whatever its version.
 * The document must still exist.
 */
export const UNCONDITIONAL_VERSION: DocVersion = "0"

export type DocumentValue = {
  readonly content: RawContent
  readonly version: DocVersion
}

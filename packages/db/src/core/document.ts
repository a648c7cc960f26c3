import type { DocKey } from "../ports/document"
import { invalidKey } from "./errors/db-error"

/**
 * Validate a key at the edge of the program.
 *
 * @throws DbError `invalid_argument` when `value` is empty.
 */
export function docKey(value: string): DocKey {
  if (value.length === 0) throw invalidKey(value)
  return value
}

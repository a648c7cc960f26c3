import { z } from "zod"
import type { DocKey, RawContent } from "../../ports/document"
import type { DocumentCodec } from "../../ports/document-codec"
import type { Program } from "../../ports/program"
import type { DbResult } from "../../ports/result"
import { decodeError } from "../errors/db-error"
import { pure } from "../program/program"
import { err, ok } from "../result/result"

export type JsonCodecOptions<T> = {
  schema: z.ZodType<T>
  /** A fixed key, or a program that produces one (e.g. `sequentialKey`). */
  keyFor: (value: T) => DocKey | Program<DocKey>
}

/**
 * JSON codec validated by a zod schema.
 *
 * @remarks
 * Content that is not JSON, or does not match the schema, is a `decode_error`.
 * Plain JSON does not preserve `Date`, `Map` or class instances; model those
 * with zod transforms in the schema.
 */
export function createJsonCodec<T>(options: JsonCodecOptions<T>): DocumentCodec<T> {
  return {
    serialize: (value) => JSON.stringify(value),

    deserialize: (content: RawContent): DbResult<T> => {
      let parsed: unknown
      try {
        parsed = JSON.parse(content)
      } catch (cause) {
        return err(decodeError("document", "content is not valid JSON", cause))
      }

      const result = options.schema.safeParse(parsed)
      if (!result.success) {
        return err(decodeError("document", z.prettifyError(result.error), result.error))
      }
      return ok(result.data)
    },

    keyFor: (value) => {
      const key = options.keyFor(value)
      return typeof key === "string" ? pure(key) : key
    },
  }
}

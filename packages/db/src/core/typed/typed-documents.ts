import type { BatchItem } from "../../ports/batch"
import type { DocKey, DocVersion } from "../../ports/document"
import type { DocumentCodec } from "../../ports/document-codec"
import type { Program } from "../../ports/program"
import { decodeError } from "../errors/db-error"
import { andThen, createDoc, fromResult, getDoc, incrementCounter, map, updateDoc } from "../program/program"
import { err, ok } from "../result/result"

export type TypedDocument<T> = {
  readonly key: DocKey
  readonly value: T
  readonly version: DocVersion
}

export function getTyped<T>(codec: DocumentCodec<T>, key: DocKey): Program<TypedDocument<T>> {
  return andThen(getDoc(key), (doc) =>
    map(fromResult(codec.deserialize(doc.content)), (value) => ({
      key,
      value,
      version: doc.version,
    })),
  )
}

/**
 * Derive the key with `codec.keyFor` and create the document.
 */
export function createTyped<T>(codec: DocumentCodec<T>, value: T): Program<TypedDocument<T>> {
  return andThen(codec.keyFor(value), (key) =>
    map(createDoc(key, codec.serialize(value)), (doc) => ({
      key,
      value,
      version: doc.version,
    })),
  )
}

/**
 * Write `doc.value` back if the stored version still matches `doc.version`.
 */
export function updateTyped<T>(
  codec: DocumentCodec<T>,
  doc: TypedDocument<T>,
): Program<TypedDocument<T>> {
  return map(updateDoc(doc.key, codec.serialize(doc.value), doc.version), (written) => ({
    ...doc,
    version: written.version,
  }))
}

export function modifyTyped<T>(
  codec: DocumentCodec<T>,
  key: DocKey,
  f: (value: T) => T,
): Program<TypedDocument<T>> {
  return andThen(getTyped(codec, key), (doc) => updateTyped(codec, { ...doc, value: f(doc.value) }))
}

/**
 * Turn values into batch items. A value the codec cannot serialize becomes a
 * failed item instead of aborting the iteration.
 */
export function* typedBatchItems<T>(
  codec: DocumentCodec<T>,
  values: Iterable<T>,
): Generator<BatchItem> {
  let index = 0
  for (const value of values) {
    try {
      yield ok({ key: codec.keyFor(value), content: codec.serialize(value) })
    } catch (cause) {
      yield err(decodeError(`batch[${index}]`, "value could not be serialized", cause))
    }
    index += 1
  }
}

/**
 * Key from a counter: `${prefix}${n}` where `n` is the incremented value.
 */
export function sequentialKey(prefix: string, counter: DocKey): Program<DocKey> {
  return map(incrementCounter(counter, 1), (n) => `${prefix}${n}`)
}

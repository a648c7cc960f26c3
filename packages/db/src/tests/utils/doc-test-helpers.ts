import { ok, err } from "../../core/result/result"
import type { BatchItem } from "../../ports/batch"
import type { DbError } from "../../core/errors/db-error"
import { pure } from "../../core/program/program"

export const keys = {
  one: () => "doc:one",
  two: () => "doc:two",
  three: () => "doc:three",
  counter: () => "counter:orders",
}

export const contents = {
  a: () => '{"name":"a"}',
  b: () => '{"name":"b"}',
  c: () => '{"name":"c"}',
}

export function itemFor(key: string, content: string): BatchItem {
  return ok({ key: pure(key), content })
}

export function failedItem(cause: DbError): BatchItem {
  return err(cause)
}

/**
 * Wraps items in a generator and records how many were pulled.
 */
export function trackedItems(items: readonly BatchItem[]): {
  source: Iterable<BatchItem>
  pulled: () => number
} {
  let pulled = 0
  function* generate(): Generator<BatchItem> {
    for (const item of items) {
      pulled += 1
      yield item
    }
  }
  return { source: generate(), pulled: () => pulled }
}

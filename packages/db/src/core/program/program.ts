import type { DocKey, DocumentValue, DocVersion, RawContent } from "../../ports/document"
import type { Program } from "../../ports/program"
import type { DbResult } from "../../ports/result"
import type { DbError } from "../errors/db-error"

export function pure<T>(value: T): Program<T> {
  return { kind: "pure", value }
}

export function fail<T = never>(error: DbError): Program<T> {
  return { kind: "fail", error }
}

/**
 * Lift a result: `ok` becomes `pure`, `err` becomes `fail`.
 */
export function fromResult<T>(result: DbResult<T>): Program<T> {
  return result.kind === "ok" ? pure(result.value) : fail(result.error)
}

/**
 * Sequence `next` after `program`, feeding it the produced value.
 * A failure of `program` skips `next`.
 */
export function andThen<A, B>(
  program: Program<A>,
  next: (value: A) => Program<B>,
): Program<B> {
  return {
    kind: "chain",
    unpack: (visit) => visit(program, next),
  }
}

export function map<A, B>(program: Program<A>, f: (value: A) => B): Program<B> {
  return andThen(program, (value) => pure(f(value)))
}

/**
 * Run programs in order and collect their values. Stops at the first failure.
 */
export function sequence<T>(programs: readonly Program<T>[]): Program<T[]> {
  return andThen(pure(undefined), () => {
    const values: T[] = []
    const collect = (index: number): Program<T[]> => {
      const program = programs[index]
      if (program === undefined) return pure(values)
      return andThen(program, (value) => {
        values.push(value)
        return collect(index + 1)
      })
    }
    return collect(0)
  })
}

/**
 * Read `key`, transform its content, and write it back under the version just
 * read. A concurrent writer surfaces as `version_conflict`; nothing is retried.
 */
export function modifyDoc(
  key: DocKey,
  f: (content: RawContent) => RawContent,
): Program<DocumentValue> {
  return andThen(getDoc(key), (doc) => updateDoc(key, f(doc.content), doc.version))
}

export function getDoc(key: DocKey): Program<DocumentValue> {
  return { kind: "suspend", instruction: { kind: "get", key, resume: (doc) => doc } }
}

export function createDoc(key: DocKey, content: RawContent): Program<DocumentValue> {
  return {
    kind: "suspend",
    instruction: { kind: "create", key, content, resume: (doc) => doc },
  }
}

/**
 * Replace `key`'s content if its stored version is still `version`.
 * Pass `UNCONDITIONAL_VERSION` to skip the check.
 */
export function updateDoc(
  key: DocKey,
  content: RawContent,
  version: DocVersion,
): Program<DocumentValue> {
  return {
    kind: "suspend",
    instruction: { kind: "update", key, content, version, resume: (doc) => doc },
  }
}

export function removeDoc(key: DocKey): Program<void> {
  return { kind: "suspend", instruction: { kind: "remove", key, resume: () => undefined } }
}

export function getCounter(key: DocKey): Program<number> {
  return {
    kind: "suspend",
    instruction: { kind: "get_counter", key, resume: (value) => value },
  }
}

/**
 * Atomically add `delta` (may be negative). A missing counter starts at `delta`.
 */
export function incrementCounter(key: DocKey, delta: number): Program<number> {
  return {
    kind: "suspend",
    instruction: { kind: "increment_counter", key, delta, resume: (value) => value },
  }
}

import type { BatchOutcome, BatchSource, ContinuePredicate } from "./batch"
import type { DocKey, DocumentValue, DocVersion, RawContent } from "./document"

export type GetCommand = {
  readonly kind: "get"
  readonly key: DocKey
}

export type CreateCommand = {
  readonly kind: "create"
  readonly key: DocKey
  readonly content: RawContent
}

export type UpdateCommand = {
  readonly kind: "update"
  readonly key: DocKey
  readonly content: RawContent
  readonly version: DocVersion
}

export type RemoveCommand = {
  readonly kind: "remove"
  readonly key: DocKey
}

export type GetCounterCommand = {
  readonly kind: "get_counter"
  readonly key: DocKey
}

export type IncrementCounterCommand = {
  readonly kind: "increment_counter"
  readonly key: DocKey
  readonly delta: number
}

export type BatchCreateCommand = {
  readonly kind: "batch_create"
  readonly items: BatchSource
  readonly shouldContinue: ContinuePredicate
}

/**
 * One primitive database action. Plain data: no backend reference, no behavior.
 */
export type Command =
  | GetCommand
  | CreateCommand
  | UpdateCommand
  | RemoveCommand
  | GetCounterCommand
  | IncrementCounterCommand
  | BatchCreateCommand

export type CommandKind = Command["kind"]

/**
 * What each command yields when it succeeds.
 */
export type CommandResults = {
  get: DocumentValue
  create: DocumentValue
  update: DocumentValue
  remove: void
  get_counter: number
  increment_counter: number
  batch_create: BatchOutcome
}

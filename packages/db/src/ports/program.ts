import type { DbError } from "../core/errors/db-error"
import type { Command, CommandKind, CommandResults } from "./command"

/**
 * A command paired with the continuation that turns its result into `T`.
 */
export type Instruction<T> = {
  [K in CommandKind]: Extract<Command, { readonly kind: K }> & {
    readonly resume: (result: CommandResults[K]) => T
  }
}[CommandKind]

export type Pure<T> = {
  readonly kind: "pure"
  readonly value: T
}

export type Failure = {
  readonly kind: "fail"
  readonly error: DbError
}

export type Suspend<T> = {
  readonly kind: "suspend"
  readonly instruction: Instruction<T>
}

export type ChainVisitor<T, R> = <A>(
  source: Program<A>,
  next: (value: A) => Program<T>,
) => R

/**
 * A stage whose program depends on the result of an earlier one.
 *
 * @remarks
 * The intermediate type is hidden; `unpack` hands it back to the visitor.
 */
export interface Chain<T> {
  readonly kind: "chain"
  unpack<R>(visit: ChainVisitor<T, R>): R
}

/**
 * A description of database work yielding `T`. Building one performs no I/O;
 * hand it to an interpreter to run it.
 */
export type Program<T> = Pure<T> | Failure | Suspend<T> | Chain<T>

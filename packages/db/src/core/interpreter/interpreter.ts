import { createNullLogger, type Logger } from "@docket/logger"
import type { BatchOutcome, BatchSource, ContinuePredicate } from "../../ports/batch"
import type { DocumentBackend } from "../../ports/document-backend"
import type { ProgramInterpreter } from "../../ports/interpreter"
import type { Instruction, Program } from "../../ports/program"
import type { DbResult } from "../../ports/result"
import { runBatch } from "../batch/run-batch"
import { backendFailure, notConnected } from "../errors/db-error"
import { toDbError } from "../errors/guards"
import { andThen } from "../program/program"
import { err, mapResult, ok, unwrap } from "../result/result"
import { validateCommand } from "./validate-command"

type Step<T> = { kind: "done"; result: DbResult<T> } | { kind: "continue"; program: Program<T> }

export type InterpreterDeps = {
  backend: DocumentBackend
  logger?: Logger
}

export class Interpreter implements ProgramInterpreter {
  readonly backend: DocumentBackend
  private readonly logger: Logger

  constructor(deps: InterpreterDeps) {
    this.backend = deps.backend
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "interpreter",
      backend: deps.backend.name,
    })
  }

  async execute<T>(program: Program<T>): Promise<DbResult<T>> {
    if (!this.backend.isConnected()) {
      this.logger.warn("Backend not connected")
      return err(notConnected())
    }

    try {
      return await this.step(program)
    } catch (cause) {
      const error = toDbError(cause)
      this.logger.error("Program threw", { err: error })
      return err(error)
    }
  }

  async run<T>(program: Program<T>): Promise<T> {
    return unwrap(await this.execute(program))
  }

  runBatch(items: BatchSource, shouldContinue: ContinuePredicate): Promise<BatchOutcome> {
    return runBatch(
      { execute: (program) => this.execute(program), logger: this.logger },
      items,
      shouldContinue,
    )
  }

  /**
   * Evaluate `program` in a loop. Left-nested chains are reassociated one
   * node per turn, so evaluation depth does not grow with program length.
   */
  private async step<T>(program: Program<T>): Promise<DbResult<T>> {
    let current: Program<T> = program
    for (;;) {
      switch (current.kind) {
        case "pure":
          return ok(current.value)
        case "fail":
          return err(current.error)
        case "suspend":
          return this.dispatch(current.instruction)
        case "chain": {
          const next: Step<T> = await current.unpack((source, continuation) =>
            this.advance(source, continuation),
          )
          if (next.kind === "done") return next.result
          current = next.program
        }
      }
    }
  }

  private async advance<A, T>(
    source: Program<A>,
    next: (value: A) => Program<T>,
  ): Promise<Step<T>> {
    switch (source.kind) {
      case "pure":
        return { kind: "continue", program: next(source.value) }
      case "fail":
        return { kind: "done", result: err(source.error) }
      case "suspend": {
        const result = await this.dispatch(source.instruction)
        if (result.kind === "err") return { kind: "done", result }
        return { kind: "continue", program: next(result.value) }
      }
      case "chain":
        return {
          kind: "continue",
          program: source.unpack((inner, innerNext) =>
            andThen(inner, (value) => andThen(innerNext(value), next)),
          ),
        }
    }
  }

  private async dispatch<T>(instruction: Instruction<T>): Promise<DbResult<T>> {
    const meta = {
      operation: instruction.kind,
      ...("key" in instruction && { key: instruction.key }),
    }

    const invalid = validateCommand(instruction)
    if (invalid !== undefined) {
      this.logger.warn("Rejected command", { ...meta, err: invalid })
      return err(invalid)
    }

    this.logger.debug("Dispatching command", meta)

    let result: DbResult<T>
    try {
      result = await this.call(instruction)
    } catch (cause) {
      result = err(backendFailure(`Backend rejected ${instruction.kind}`, cause, meta))
    }

    if (result.kind === "err") {
      this.logger.warn("Command failed", { ...meta, err: result.error })
    }
    return result
  }

  private async call<T>(instruction: Instruction<T>): Promise<DbResult<T>> {
    switch (instruction.kind) {
      case "get":
        return mapResult(await this.backend.get(instruction.key), instruction.resume)
      case "create":
        return mapResult(
          await this.backend.create(instruction.key, instruction.content),
          instruction.resume,
        )
      case "update":
        return mapResult(
          await this.backend.update(
            instruction.key,
            instruction.content,
            instruction.version,
          ),
          instruction.resume,
        )
      case "remove":
        return mapResult(await this.backend.remove(instruction.key), instruction.resume)
      case "get_counter":
        return mapResult(await this.backend.getCounter(instruction.key), instruction.resume)
      case "increment_counter":
        return mapResult(
          await this.backend.incrementCounter(instruction.key, instruction.delta),
          instruction.resume,
        )
      case "batch_create":
        return ok(
          instruction.resume(
            await this.runBatch(instruction.items, instruction.shouldContinue),
          ),
        )
    }
  }
}

export function createInterpreter(deps: InterpreterDeps): ProgramInterpreter {
  return new Interpreter(deps)
}

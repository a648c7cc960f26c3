import type { Command } from "../../ports/command"
import { type DbError, invalidDelta, invalidKey } from "../errors/db-error"

/**
 * Reject arguments no backend could accept, before anything is dispatched.
 */
export function validateCommand(command: Command): DbError | undefined {
  if (command.kind === "batch_create") return undefined
  if (command.key.length === 0) return invalidKey(command.key)
  if (command.kind === "increment_counter" && !Number.isSafeInteger(command.delta)) {
    return invalidDelta(command.delta)
  }
  return undefined
}

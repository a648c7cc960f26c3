import {
  alreadyExists,
  backendFailure,
  decodeError,
  notFound,
  versionConflict,
} from "../../core/errors/db-error"
import { err } from "../../core/result/result"
import type { DocKey, DocVersion } from "../../ports/document"
import type { DbResult } from "../../ports/result"

export type ScriptReply = {
  readonly status: string
  readonly fields: readonly string[]
}

function readReply(reply: unknown): ScriptReply | undefined {
  if (!Array.isArray(reply)) return undefined

  const parts: string[] = []
  for (const part of reply) {
    if (typeof part !== "string") return undefined
    parts.push(part)
  }

  const [status, ...fields] = parts
  return status === undefined ? undefined : { status, fields }
}

export type BridgeCall<T> = {
  key: DocKey
  /** Version the caller expected, reported on a conflict. */
  expectedVersion?: DocVersion
  send: () => Promise<unknown>
  /** Interpret an `ok` reply's fields. */
  onOk: (fields: readonly string[]) => DbResult<T>
}

/**
 * The single place where a driver completion becomes a `DbResult`.
 *
 * @remarks
 * - a rejection is `backend_failure`
 * - an empty completion (`null`/`undefined`) is `not_found`
 * - status strings map onto the matching error kinds
 */
export async function settle<T>(call: BridgeCall<T>): Promise<DbResult<T>> {
  let raw: unknown
  try {
    raw = await call.send()
  } catch (cause) {
    return err(backendFailure(`Redis call failed for ${call.key}`, cause, { key: call.key }))
  }

  if (raw === null || raw === undefined) return err(notFound(call.key))

  const reply = readReply(raw)
  if (reply === undefined) {
    return err(backendFailure(`Unexpected Redis reply for ${call.key}`, undefined, { key: call.key }))
  }

  switch (reply.status) {
    case "ok":
      return call.onOk(reply.fields)
    case "not_found":
      return err(notFound(call.key))
    case "already_exists":
      return err(alreadyExists(call.key))
    case "version_conflict":
      return err(versionConflict(call.key, call.expectedVersion ?? "", reply.fields[0]))
    case "decode_error":
      return err(decodeError(call.key, "counter is not an integer"))
    default:
      return err(
        backendFailure(`Unknown Redis status "${reply.status}"`, undefined, { key: call.key }),
      )
  }
}

import { type Logger, createNullLogger } from "@docket/logger"
import { formatCounter, parseCounter } from "../../core/counter/counter"
import { backendFailure, decodeError, notConnected } from "../../core/errors/db-error"
import { err, ok } from "../../core/result/result"
import type { DocKey, DocumentValue, DocVersion, RawContent } from "../../ports/document"
import type { DocumentBackend } from "../../ports/document-backend"
import type { DbResult } from "../../ports/result"
import { type BridgeCall, settle } from "./driver-bridge"
import type { RedisConnection } from "./redis-connection"
import {
  CREATE_SCRIPT,
  GET_COUNTER_SCRIPT,
  GET_SCRIPT,
  INCREMENT_COUNTER_SCRIPT,
  REMOVE_SCRIPT,
  UPDATE_SCRIPT,
} from "./scripts"

export type RedisDocumentBackendDeps = {
  connection: RedisConnection
  logger?: Logger
}

function versionAt(key: DocKey, fields: readonly string[]): DbResult<DocVersion> {
  const [version] = fields
  return version === undefined
    ? err(backendFailure(`Redis reply for ${key} has no version`, undefined, { key }))
    : ok(version)
}

/**
 * Redis implementation of DocumentBackend.
 *
 * @remarks
 * - Documents live at `<bucket>:doc:<key>`, versions at `<bucket>:ver:<key>`
 * - Versions come from one `INCR` sequence per bucket (`<bucket>:seq`)
 * - Every command is a single EVAL, so check-and-write is atomic
 */
export class RedisDocumentBackend implements DocumentBackend {
  readonly name = "redis"
  private readonly logger: Logger

  public constructor(private readonly deps: RedisDocumentBackendDeps) {
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "redis-backend",
      bucket: deps.connection.bucketName,
    })
  }

  isConnected(): boolean {
    return this.deps.connection.isConnected()
  }

  get(key: DocKey): Promise<DbResult<DocumentValue>> {
    return this.eval(key, GET_SCRIPT, [], {
      onOk: ([content, version]) =>
        content === undefined || version === undefined
          ? err(backendFailure(`Redis reply for ${key} is incomplete`, undefined, { key }))
          : ok({ content, version }),
    })
  }

  create(key: DocKey, content: RawContent): Promise<DbResult<DocumentValue>> {
    return this.eval(key, CREATE_SCRIPT, [content], {
      onOk: (fields) => this.written(key, content, fields),
    })
  }

  update(key: DocKey, content: RawContent, version: DocVersion): Promise<DbResult<DocumentValue>> {
    return this.eval(key, UPDATE_SCRIPT, [content, version], {
      expectedVersion: version,
      onOk: (fields) => this.written(key, content, fields),
    })
  }

  remove(key: DocKey): Promise<DbResult<void>> {
    return this.eval(key, REMOVE_SCRIPT, [], { onOk: () => ok(undefined) })
  }

  getCounter(key: DocKey): Promise<DbResult<number>> {
    return this.eval(key, GET_COUNTER_SCRIPT, [], {
      onOk: (fields) => this.counterValue(key, fields),
    })
  }

  incrementCounter(key: DocKey, delta: number): Promise<DbResult<number>> {
    return this.eval(key, INCREMENT_COUNTER_SCRIPT, [formatCounter(delta)], {
      onOk: (fields) => this.counterValue(key, fields),
    })
  }

  private written(
    key: DocKey,
    content: RawContent,
    fields: readonly string[],
  ): DbResult<DocumentValue> {
    const version = versionAt(key, fields)
    return version.kind === "ok" ? ok({ content, version: version.value }) : version
  }

  private counterValue(key: DocKey, fields: readonly string[]): DbResult<number> {
    const [text] = fields
    const value = text === undefined ? undefined : parseCounter(text)
    return value === undefined ? err(decodeError(key, "counter is not an integer")) : ok(value)
  }

  private async eval<T>(
    key: DocKey,
    script: string,
    args: string[],
    handlers: Omit<BridgeCall<T>, "key" | "send">,
  ): Promise<DbResult<T>> {
    const client = this.deps.connection.client()
    if (client === undefined) return err(notConnected())

    const { bucketName } = this.deps.connection
    const result = await settle<T>({
      ...handlers,
      key,
      send: () =>
        client.eval(script, {
          keys: [`${bucketName}:doc:${key}`, `${bucketName}:ver:${key}`, `${bucketName}:seq`],
          arguments: args,
        }),
    })

    if (result.kind === "err" && result.error.code === "backend_failure") {
      this.logger.error("Redis command failed", { key, err: result.error })
    }
    return result
  }
}

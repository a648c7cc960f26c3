import {
  type ConnectionEnv,
  type ConnectionSettings,
  type IConfig,
  type LoadConnectionConfigOptions,
  loadConnectionConfig,
  toConnectionSettings,
} from "@docket/config"
import { createPinoLogger, type Logger } from "@docket/logger"
import { backendFailure } from "../../core/errors/db-error"
import { createInterpreter } from "../../core/interpreter/interpreter"
import { err, ok } from "../../core/result/result"
import type { ProgramInterpreter } from "../../ports/interpreter"
import type { DbResult } from "../../ports/result"
import type { CreateRedisClient } from "./redis-client"
import { RedisConnection } from "./redis-connection"
import { RedisDocumentBackend } from "./redis-document-backend"

export type RedisSession = {
  readonly settings: ConnectionSettings
  readonly connection: RedisConnection
  readonly backend: RedisDocumentBackend
  readonly interpreter: ProgramInterpreter
}

export type ConnectFromConfigOptions = LoadConnectionConfigOptions & {
  /** Defaults to a pino logger configured from `LOG_LEVEL`/`LOG_PRETTY`. */
  logger?: Logger
  createClient?: CreateRedisClient
}

/**
 * Wire a Redis-backed interpreter from settings. The connection is not opened.
 */
export function createRedisSession(
  settings: ConnectionSettings,
  deps: { logger: Logger; createClient?: CreateRedisClient },
): RedisSession {
  const logger = deps.logger.child({ backend: "redis", bucket: settings.bucketName })
  const connection = new RedisConnection(settings, {
    logger,
    ...(deps.createClient !== undefined && { createClient: deps.createClient }),
  })
  const backend = new RedisDocumentBackend({ connection, logger })
  const interpreter = createInterpreter({ backend, logger })
  return { settings, connection, backend, interpreter }
}

/**
 * Load configuration, build a session and connect it.
 *
 * @remarks
 * Invalid configuration and unreachable servers both resolve as
 * `backend_failure`; nothing is left open on failure.
 */
export async function connectFromConfig(
  opts: ConnectFromConfigOptions = {},
): Promise<DbResult<RedisSession>> {
  let config: IConfig<ConnectionEnv>
  try {
    config = await loadConnectionConfig(opts)
  } catch (cause) {
    return err(backendFailure("Invalid database configuration", cause))
  }

  const settings = toConnectionSettings(config.value)
  const logger =
    opts.logger ?? createPinoLogger({}, settings.logging, { service: "docket" })

  logger.debug("Configuration loaded", {
    sources: config.sourcesUsed(),
    hostFrom: config.explain("DB_HOST"),
  })
  const unknown = config.unknownKeys()
  if (unknown.length > 0) {
    logger.warn("Unknown configuration keys", { keys: unknown })
  }

  const session = createRedisSession(settings, {
    logger,
    ...(opts.createClient !== undefined && { createClient: opts.createClient }),
  })

  const connected = await session.connection.connect()
  return connected.kind === "ok" ? ok(session) : connected
}

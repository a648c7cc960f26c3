import { createClient } from "redis"

/**
 * The slice of the node-redis client the document backend uses.
 */
export type RedisDocumentClient = {
  readonly isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>
  on(event: "error", listener: (error: Error) => void): unknown
  eval(script: string, opts: { keys: string[]; arguments: string[] }): Promise<unknown>
}

export type RedisClientSettings = {
  host: string
  port: number
  connectTimeoutMs: number
}

export type CreateRedisClient = (settings: RedisClientSettings) => RedisDocumentClient

/**
 * Build a node-redis client that fails fast instead of reconnecting forever,
 * so `connect()` can report the failure.
 */
export const createRedisClient: CreateRedisClient = (settings) =>
  createClient({
    socket: {
      host: settings.host,
      port: settings.port,
      connectTimeout: settings.connectTimeoutMs,
      reconnectStrategy: false,
    },
  }) as unknown as RedisDocumentClient

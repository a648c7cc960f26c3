import { createNullLogger, type Logger } from "@docket/logger"
import { backendFailure } from "../../core/errors/db-error"
import { err, ok } from "../../core/result/result"
import type { DbResult } from "../../ports/result"
import {
  type CreateRedisClient,
  createRedisClient,
  type RedisDocumentClient,
} from "./redis-client"

export type RedisConnectionOptions = {
  host: string
  port: number
  bucketName: string
  /** Number of driver clients opened; calls rotate over them. */
  kvEndpoints: number
  connectTimeoutMs: number
}

export type RedisConnectionDeps = {
  createClient?: CreateRedisClient
  logger?: Logger
}

export type ConnectionState =
  | { readonly kind: "disconnected" }
  | { readonly kind: "connected"; readonly clients: readonly RedisDocumentClient[] }

/**
 * Owns the driver clients of one session.
 *
 * @remarks
 * Usually one per process, created at startup and passed to
 * `RedisDocumentBackend`. Nothing here is global.
 */
export class RedisConnection {
  private state: ConnectionState = { kind: "disconnected" }
  private connecting: Promise<DbResult<void>> | undefined
  private cursor = 0
  private readonly createClient: CreateRedisClient
  private readonly logger: Logger

  public constructor(
    readonly opts: RedisConnectionOptions,
    deps: RedisConnectionDeps = {},
  ) {
    this.createClient = deps.createClient ?? createRedisClient
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "redis-connection",
      bucket: opts.bucketName,
    })
  }

  get bucketName(): string {
    return this.opts.bucketName
  }

  isConnected(): boolean {
    return this.state.kind === "connected"
  }

  /**
   * Open `kvEndpoints` clients. On failure every client opened so far is
   * closed and the connection stays disconnected. Overlapping calls share
   * one attempt.
   */
  async connect(): Promise<DbResult<void>> {
    if (this.state.kind === "connected") return ok(undefined)

    this.connecting ??= this.open().finally(() => {
      this.connecting = undefined
    })
    return this.connecting
  }

  private async open(): Promise<DbResult<void>> {
    const { host, port, kvEndpoints, connectTimeoutMs } = this.opts
    this.logger.info("Connecting", { host, port, kvEndpoints })

    const opened: RedisDocumentClient[] = []
    try {
      for (let i = 0; i < kvEndpoints; i += 1) {
        const client = this.createClient({ host, port, connectTimeoutMs })
        client.on("error", (error) => this.logger.error("Redis client error", { err: error }))
        opened.push(client)
        await client.connect()
      }
    } catch (cause) {
      this.logger.error("Connection failed", { host, port, err: cause })
      await this.close(opened)
      return err(backendFailure(`Cannot connect to ${host}:${port}`, cause, { host, port }))
    }

    this.state = { kind: "connected", clients: opened }
    this.cursor = 0
    this.logger.info("Connected", { host, port })
    return ok(undefined)
  }

  /**
   * Close all clients, after any connect still in flight settles. Safe to
   * call when already disconnected.
   */
  async disconnect(): Promise<void> {
    if (this.connecting !== undefined) await this.connecting
    if (this.state.kind === "disconnected") return

    const { clients } = this.state
    this.state = { kind: "disconnected" }
    await this.close(clients)
    this.logger.info("Disconnected")
  }

  /**
   * Next client in round-robin order, or `undefined` when disconnected.
   */
  client(): RedisDocumentClient | undefined {
    if (this.state.kind === "disconnected") return undefined

    const { clients } = this.state
    const client = clients[this.cursor % clients.length]
    this.cursor = (this.cursor + 1) % clients.length
    return client
  }

  private async close(clients: readonly RedisDocumentClient[]): Promise<void> {
    const results = await Promise.allSettled(
      clients.filter((client) => client.isOpen).map((client) => client.quit()),
    )
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn("Failed to close Redis client", { err: result.reason })
      }
    }
  }
}

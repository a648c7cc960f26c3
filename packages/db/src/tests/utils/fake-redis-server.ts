import type { RedisClientSettings, RedisDocumentClient } from "../../adapters/redis/redis-client"
import {
  CREATE_SCRIPT,
  GET_COUNTER_SCRIPT,
  GET_SCRIPT,
  INCREMENT_COUNTER_SCRIPT,
  REMOVE_SCRIPT,
  UPDATE_SCRIPT,
} from "../../adapters/redis/scripts"

/**
 * In-process stand-in for a Redis server. Runs each known Lua script as its
 * JavaScript equivalent over a shared string map.
 */
export class FakeRedisServer {
  readonly data = new Map<string, string>()
  readonly clients: FakeRedisClient[] = []
  /** Makes the n-th `connect()` (0-based) reject. */
  failConnectAt: number | undefined
  private connects = 0

  createClient = (settings: RedisClientSettings): RedisDocumentClient => {
    const client = new FakeRedisClient(this, settings)
    this.clients.push(client)
    return client
  }

  nextConnectFails(): boolean {
    const attempt = this.connects
    this.connects += 1
    return attempt === this.failConnectAt
  }

  run(script: string, keys: readonly string[], args: readonly string[]): unknown {
    const [doc = "", ver = "", seq = ""] = keys
    const nextVersion = (): string => {
      const next = String(Number(this.data.get(seq) ?? "0") + 1)
      this.data.set(seq, next)
      return next
    }

    switch (script) {
      case GET_SCRIPT: {
        const content = this.data.get(doc)
        return content === undefined ? null : ["ok", content, this.data.get(ver) ?? "0"]
      }
      case CREATE_SCRIPT: {
        if (this.data.has(doc)) return ["already_exists"]
        const version = nextVersion()
        this.data.set(doc, args[0] ?? "")
        this.data.set(ver, version)
        return ["ok", version]
      }
      case UPDATE_SCRIPT: {
        if (!this.data.has(doc)) return ["not_found"]
        const current = this.data.get(ver) ?? "0"
        if (args[1] !== "0" && current !== args[1]) return ["version_conflict", current]
        const version = nextVersion()
        this.data.set(doc, args[0] ?? "")
        this.data.set(ver, version)
        return ["ok", version]
      }
      case REMOVE_SCRIPT: {
        if (!this.data.delete(doc)) return ["not_found"]
        this.data.delete(ver)
        return ["ok"]
      }
      case GET_COUNTER_SCRIPT: {
        const content = this.data.get(doc)
        return content === undefined ? null : ["ok", content]
      }
      case INCREMENT_COUNTER_SCRIPT: {
        const current = this.data.get(doc)
        let value = Number(args[0])
        if (current !== undefined) {
          if (!/^-?\d+$/.test(current)) return ["decode_error", current]
          value += Number(current)
        }
        if (!Number.isSafeInteger(value)) return ["decode_error", current ?? ""]
        const text = String(value)
        this.data.set(doc, text)
        this.data.set(ver, nextVersion())
        return ["ok", text]
      }
      default:
        throw new Error("NOSCRIPT No matching script")
    }
  }
}

export class FakeRedisClient implements RedisDocumentClient {
  isOpen = false
  evalCount = 0
  readonly errorListeners: ((error: Error) => void)[] = []

  constructor(
    private readonly server: FakeRedisServer,
    readonly settings: RedisClientSettings,
  ) {}

  async connect(): Promise<void> {
    if (this.server.nextConnectFails()) {
      throw new Error(`connect ECONNREFUSED ${this.settings.host}:${this.settings.port}`)
    }
    this.isOpen = true
  }

  async quit(): Promise<void> {
    this.isOpen = false
  }

  on(_event: "error", listener: (error: Error) => void): this {
    this.errorListeners.push(listener)
    return this
  }

  async eval(script: string, opts: { keys: string[]; arguments: string[] }): Promise<unknown> {
    if (!this.isOpen) throw new Error("The client is closed")
    this.evalCount += 1
    return this.server.run(script, opts.keys, opts.arguments)
  }
}

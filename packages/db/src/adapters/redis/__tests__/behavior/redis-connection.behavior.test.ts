import { FakeRedisServer } from "../../../../tests/utils/fake-redis-server"
import { RecordingLogger } from "../../../../tests/utils/recording-logger"
import { expectErr } from "../../../../tests/utils/result-helpers"
import { RedisConnection, type RedisConnectionOptions } from "../../redis-connection"

const options: RedisConnectionOptions = {
  host: "cache.internal",
  port: 6380,
  bucketName: "orders",
  kvEndpoints: 3,
  connectTimeoutMs: 250,
}

describe("RedisConnection (behavior)", () => {
  let server: FakeRedisServer
  let logger: RecordingLogger
  let connection: RedisConnection

  beforeEach(() => {
    server = new FakeRedisServer()
    logger = new RecordingLogger()
    connection = new RedisConnection(options, { createClient: server.createClient, logger })
  })

  it("starts disconnected and hands out no client", () => {
    expect(connection.isConnected()).toBe(false)
    expect(connection.client()).toBeUndefined()
  })

  it("opens kvEndpoints clients with the configured settings", async () => {
    expect(await connection.connect()).toStrictEqual({ kind: "ok", value: undefined })

    expect(connection.isConnected()).toBe(true)
    expect(server.clients).toHaveLength(3)
    expect(server.clients.every((client) => client.isOpen)).toBe(true)
    expect(server.clients[0]?.settings).toStrictEqual({
      host: "cache.internal",
      port: 6380,
      connectTimeoutMs: 250,
    })
  })

  it("does not open more clients when already connected", async () => {
    await connection.connect()
    await connection.connect()

    expect(server.clients).toHaveLength(3)
  })

  it("shares one attempt between overlapping connects", async () => {
    const results = await Promise.all([connection.connect(), connection.connect()])

    expect(results).toStrictEqual([
      { kind: "ok", value: undefined },
      { kind: "ok", value: undefined },
    ])
    expect(server.clients).toHaveLength(3)
    expect(logger.messages("info")).toStrictEqual(["Connecting", "Connected"])

    await connection.disconnect()

    expect(server.clients.some((client) => client.isOpen)).toBe(false)
  })

  it("closes the clients of a connect still in flight on disconnect", async () => {
    const pending = connection.connect()

    await connection.disconnect()

    expect(await pending).toStrictEqual({ kind: "ok", value: undefined })
    expect(connection.isConnected()).toBe(false)
    expect(server.clients).toHaveLength(3)
    expect(server.clients.some((client) => client.isOpen)).toBe(false)
  })

  it("rotates over the open clients", async () => {
    await connection.connect()

    const picked = [1, 2, 3, 4].map(() => connection.client())

    expect(picked).toStrictEqual([
      server.clients[0],
      server.clients[1],
      server.clients[2],
      server.clients[0],
    ])
  })

  it("closes opened clients and stays disconnected when a connect fails", async () => {
    server.failConnectAt = 1

    const error = expectErr(await connection.connect(), "backend_failure")

    expect(error.message).toBe("Cannot connect to cache.internal:6380")
    expect(error.context).toStrictEqual({ host: "cache.internal", port: 6380 })
    expect(error.cause).toBeInstanceOf(Error)
    expect(connection.isConnected()).toBe(false)
    expect(server.clients).toHaveLength(2)
    expect(server.clients.some((client) => client.isOpen)).toBe(false)
    expect(logger.messages("error")).toStrictEqual(["Connection failed"])
  })

  it("can connect again after a failed attempt", async () => {
    server.failConnectAt = 0
    await connection.connect()

    expect((await connection.connect()).kind).toBe("ok")
    expect(connection.isConnected()).toBe(true)
  })

  it("disconnect closes every client and is idempotent", async () => {
    await connection.connect()

    await connection.disconnect()
    await connection.disconnect()

    expect(connection.isConnected()).toBe(false)
    expect(server.clients.some((client) => client.isOpen)).toBe(false)
    expect(logger.messages("info")).toStrictEqual(["Connecting", "Connected", "Disconnected"])
  })

  it("logs driver errors with the bucket", async () => {
    await connection.connect()
    const listener = server.clients[0]?.errorListeners[0]

    listener?.(new Error("socket hang up"))

    const entry = logger.entries.find((e) => e.message === "Redis client error")
    expect(entry?.level).toBe("error")
    expect(entry?.meta.bucket).toBe("orders")
    expect(entry?.meta.module).toBe("redis-connection")
  })
})

import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { createDoc, getDoc } from "../../../../core/program/program"
import { FakeRedisServer } from "../../../../tests/utils/fake-redis-server"
import { RecordingLogger } from "../../../../tests/utils/recording-logger"
import { expectErr, expectOk } from "../../../../tests/utils/result-helpers"
import { connectFromConfig } from "../../create"

describe("connectFromConfig", () => {
  let cwd: string
  let server: FakeRedisServer
  let logger: RecordingLogger

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "docket-db-"))
    server = new FakeRedisServer()
    logger = new RecordingLogger()
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("connects with the layered settings", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "DOCKET_DB_BUCKET_NAME=invoices\n")

    const session = expectOk(
      await connectFromConfig({
        cwd,
        env: { DOCKET_DB_HOST: "redis.test", DOCKET_DB_KV_ENDPOINTS: "3" },
        logger,
        createClient: server.createClient,
      }),
    )

    expect(session.settings.bucketName).toBe("invoices")
    expect(session.connection.isConnected()).toBe(true)
    expect(server.clients.map((client) => client.settings.host)).toStrictEqual([
      "redis.test",
      "redis.test",
      "redis.test",
    ])

    expectOk(await session.interpreter.execute(createDoc("a", "{}")))
    expect(expectOk(await session.interpreter.execute(getDoc("a"))).content).toBe("{}")
    expect(server.data.get("invoices:doc:a")).toBe("{}")

    await session.connection.disconnect()
  })

  it("warns about configuration keys it does not recognise", async () => {
    const session = expectOk(
      await connectFromConfig({
        cwd,
        env: { DOCKET_DB_HOTS: "redis.test" },
        logger,
        createClient: server.createClient,
      }),
    )

    const warnings = logger.entries.filter((entry) => entry.level === "warn")
    expect(warnings).toStrictEqual([
      { level: "warn", message: "Unknown configuration keys", meta: { keys: ["DB_HOTS"] } },
    ])
    expect(server.clients[0]?.settings.host).toBe("localhost")

    await session.connection.disconnect()
  })

  it("does not warn when every key is recognised", async () => {
    const session = expectOk(
      await connectFromConfig({
        cwd,
        env: { DOCKET_DB_IO_POOL_SIZE: "8" },
        logger,
        createClient: server.createClient,
      }),
    )

    expect(logger.messages("warn")).toStrictEqual([])

    await session.connection.disconnect()
  })

  it("reports invalid configuration as backend_failure without connecting", async () => {
    const error = expectErr(
      await connectFromConfig({
        cwd,
        env: { DOCKET_DB_KV_ENDPOINTS: "0" },
        logger,
        createClient: server.createClient,
      }),
      "backend_failure",
    )

    expect(error.message).toBe("Invalid database configuration")
    expect(server.clients).toHaveLength(0)
  })

  it("reports an unreachable server as backend_failure", async () => {
    server.failConnectAt = 0

    const error = expectErr(
      await connectFromConfig({ cwd, env: {}, logger, createClient: server.createClient }),
      "backend_failure",
    )

    expect(error.message).toBe("Cannot connect to localhost:6379")
  })
})

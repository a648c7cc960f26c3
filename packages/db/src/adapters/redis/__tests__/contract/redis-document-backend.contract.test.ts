import { describeDocumentBackendContract } from "../../../../ports/__tests__/document-backend.contract"
import { FakeRedisServer } from "../../../../tests/utils/fake-redis-server"
import { RedisConnection } from "../../redis-connection"
import { RedisDocumentBackend } from "../../redis-document-backend"

describeDocumentBackendContract("RedisDocumentBackend", async () => {
  const server = new FakeRedisServer()
  const connection = new RedisConnection(
    {
      host: "localhost",
      port: 6379,
      bucketName: "contract",
      kvEndpoints: 2,
      connectTimeoutMs: 1000,
    },
    { createClient: server.createClient },
  )
  const connected = await connection.connect()
  if (connected.kind === "err") throw connected.error

  return new RedisDocumentBackend({ connection })
})

import { Writable } from "node:stream"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(lines: string[], index: number): Record<string, unknown> {
  const line = lines[index]
  if (line === undefined) throw new Error(`no log line at ${index}`)

  return JSON.parse(line)
}

describe("PinoLogger behavior", () => {
  it("emits JSON lines with the construction context and call meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { backend: "memory" },
    )

    logger.info("command dispatched", { operation: "create", key: "doc:1" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines, 0)

    expect(payload).toMatchObject({
      msg: "command dispatched",
      backend: "memory",
      operation: "create",
      key: "doc:1",
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the parent's sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { bucket: "orders" })
    const child = base.child({ operation: "batch_create" })

    child.info("ignored")
    child.warn("batch aborted")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines, 0)).toMatchObject({
      msg: "batch aborted",
      bucket: "orders",
      operation: "batch_create",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })
    const err = new Error("create failed", { cause: new Error("socket closed") })

    logger.error("driver fault", { err })

    expect(parseLine(lines, 0)).toMatchObject({
      err: {
        type: "Error",
        message: "create failed",
        cause: { type: "Error", message: "socket closed" },
      },
    })
  })

  it("emits nothing for levels below the minimum", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "error" })

    logger.trace("t")
    logger.debug("d")
    logger.info("i")
    logger.warn("w")

    expect(lines).toHaveLength(0)
  })
})

import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError } from "../../../core/config-error"
import { JsonSource } from "../json-source"

describe("JsonSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "json-source-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("names itself after the file", () => {
    expect(new JsonSource({ file: "docket.local.json", required: false }).name).toBe(
      "json:docket.local.json",
    )
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new JsonSource({ file: "absent.json", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("throws ConfigError when file missing and required", async () => {
    const source = new JsonSource({ file: "absent.json", required: true, cwd })

    await expect(source.load()).rejects.toBeInstanceOf(ConfigError)
  })

  it("throws ConfigError on malformed JSON", async () => {
    await fs.writeFile(path.join(cwd, "bad.json"), "{ DB_HOST: ")

    const source = new JsonSource({ file: "bad.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow("Invalid JSON in bad.json")
  })

  it("rejects a top-level array", async () => {
    await fs.writeFile(path.join(cwd, "list.json"), "[1, 2]")

    const source = new JsonSource({ file: "list.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow("list.json must hold a JSON object")
  })

  it("resolves absolute paths regardless of cwd", async () => {
    const file = path.join(cwd, "abs.json")
    await fs.writeFile(file, JSON.stringify({ DB_BUCKET_NAME: "orders" }))

    const source = new JsonSource({ file, required: true, cwd: os.tmpdir() })

    expect(await source.load()).toEqual({ DB_BUCKET_NAME: "orders" })
  })
})

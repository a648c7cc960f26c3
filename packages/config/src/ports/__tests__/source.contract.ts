import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  setup: (cwd: string) => Promise<void>
  make: (cwd: string) => ConfigSource
  expectedValue: Record<string, unknown>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "docket-config-"))
      await h.setup(cwd)
      source = h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("loads the expected values", async () => {
      expect(await source.load()).toEqual(h.expectedValue)
    })

    it("returns a fresh object on every load", async () => {
      const first = await source.load()
      first.MUTATED = "yes"

      const second = await source.load()

      expect(second).toEqual(h.expectedValue)
    })
  })
}

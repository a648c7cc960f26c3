import type { ConfigSource } from "../../ports/source"
import { ConfigError } from "../../core/config-error"
import { type FileSourceOptions, readConfigFile } from "../read-optional-file"

export type JsonSourceOptions = FileSourceOptions

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts, this.name)

    if (content === undefined) return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw new ConfigError(`Invalid JSON in ${this.opts.file}`, this.name, { cause: err })
    }

    if (!isRecord(parsed)) {
      throw new ConfigError(`${this.opts.file} must hold a JSON object`, this.name)
    }

    return parsed
  }
}

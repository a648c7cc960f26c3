import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../read-optional-file"

export type DotenvSourceOptions = FileSourceOptions & {
  /**
   * Only keep keys starting with this prefix, with the prefix removed.
   */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts, this.name)

    if (content === undefined) return {}

    return stripPrefix(parse(content), this.opts.prefix)
  }
}

export function stripPrefix(
  values: Record<string, string | undefined>,
  prefix: string | undefined,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}

import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../core/config-error"

export type FileSourceOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   */
  file: string

  /**
   * - `true`: a missing file is an error.
   * - `false`: a missing file loads as empty.
   */
  required: boolean

  /**
   * Base directory for relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads a config file as text, or returns undefined when an optional file is absent.
 */
export async function readConfigFile(
  opts: FileSourceOptions,
  sourceName: string,
): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isMissingFile(err)) return undefined

    throw new ConfigError(`Cannot read ${filePath}`, sourceName, { cause: err })
  }
}

import { fileURLToPath } from "node:url"
import { logLevelNames } from "@docket/logger"
import { z } from "zod"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import { JsonSource } from "../adapters/json/json-source"
import { ObjectSource } from "../adapters/object/object-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { loadConfig } from "./load"

export const DEFAULTS_FILE = fileURLToPath(
  new URL("../../defaults/connection.json", import.meta.url),
)
export const LOCAL_OVERRIDE_FILE = "docket.local.json"
export const DOTENV_FILE = ".env"
export const ENV_PREFIX = "DOCKET_"

const flag = z.union([z.boolean(), z.stringbool()])

/**
 * Flat keys understood by `loadConnectionConfig`.
 *
 * @remarks
 * Documented defaults live in `defaults/connection.json`, the first source.
 *
 * `DB_IO_POOL_SIZE` and `DB_COMPUTATION_POOL_SIZE` are validated and then
 * ignored: node-redis has no worker pools to size. They are accepted so that
 * configuration written for the pooled driver still loads.
 */
export const connectionSchema = z.object({
  DB_HOST: z.string().min(1),
  DB_PORT: z.coerce.number().int().min(1).max(65_535),
  DB_BUCKET_NAME: z.string().min(1),
  DB_KV_ENDPOINTS: z.coerce.number().int().min(1).max(64),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive(),
  DB_IO_POOL_SIZE: z.coerce.number().int().min(1),
  DB_COMPUTATION_POOL_SIZE: z.coerce.number().int().min(1),
  LOG_LEVEL: z.enum(logLevelNames),
  LOG_PRETTY: flag,
})

export type ConnectionEnv = z.infer<typeof connectionSchema>

export type ConnectionSettings = {
  host: string
  port: number
  bucketName: string
  kvEndpoints: number
  connectTimeoutMs: number
  logging: {
    level: ConnectionEnv["LOG_LEVEL"]
    prettify: boolean
  }
}

export type LoadConnectionConfigOptions = {
  /**
   * Directory searched for `docket.local.json` and `.env`.
   *
   * @default process.cwd()
   */
  cwd?: string
  /**
   * Environment scanned for `DOCKET_`-prefixed keys.
   *
   * @default process.env
   */
  env?: Record<string, string | undefined>
  /**
   * Values applied after every other source.
   */
  overrides?: Partial<Record<keyof ConnectionEnv, unknown>>
}

/**
 * Layers: bundled defaults, local JSON override, `.env`, `DOCKET_*` environment,
 * then programmatic overrides. Later layers win.
 */
export function connectionSources(opts: LoadConnectionConfigOptions = {}): ConfigSource[] {
  const sources: ConfigSource[] = [
    new JsonSource({ file: DEFAULTS_FILE, required: true }),
    new JsonSource({
      file: LOCAL_OVERRIDE_FILE,
      required: false,
      ...(opts.cwd !== undefined && { cwd: opts.cwd }),
    }),
    new DotenvSource({
      file: DOTENV_FILE,
      required: false,
      prefix: ENV_PREFIX,
      ...(opts.cwd !== undefined && { cwd: opts.cwd }),
    }),
    new EnvSource({ prefix: ENV_PREFIX, ...(opts.env !== undefined && { env: opts.env }) }),
  ]

  if (opts.overrides) {
    sources.push(new ObjectSource(opts.overrides))
  }

  return sources
}

export function loadConnectionConfig(
  opts: LoadConnectionConfigOptions = {},
): Promise<IConfig<ConnectionEnv>> {
  return loadConfig({ schema: connectionSchema, sources: connectionSources(opts) })
}

export function toConnectionSettings(env: ConnectionEnv): ConnectionSettings {
  return {
    host: env.DB_HOST,
    port: env.DB_PORT,
    bucketName: env.DB_BUCKET_NAME,
    kvEndpoints: env.DB_KV_ENDPOINTS,
    connectTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

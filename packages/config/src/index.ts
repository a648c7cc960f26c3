export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigError } from "./core/config-error"
export {
  type ConnectionEnv,
  type ConnectionSettings,
  connectionSchema,
  connectionSources,
  DEFAULTS_FILE,
  DOTENV_FILE,
  ENV_PREFIX,
  LOCAL_OVERRIDE_FILE,
  type LoadConnectionConfigOptions,
  loadConnectionConfig,
  toConnectionSettings,
} from "./core/connection"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"

/**
 * A source of raw configuration values.
 *
 * Sources only *load*. Validation, coercion and merging happen in
 * `loadConfig`; when several sources are given, later ones win.
 */
export interface ConfigSource {
  /**
   * Name used in provenance, e.g. "env", "dotenv:.env", "json:docket.local.json".
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * - Env and dotenv sources return flat string values
   * - JSON sources return whatever the file holds at the top level
   * - A key mapped to undefined counts as "not provided"
   */
  load(): Promise<Record<string, unknown>>
}

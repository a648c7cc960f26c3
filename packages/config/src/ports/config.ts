/**
 * Validated configuration with provenance.
 *
 * @typeParam T - Shape of the configuration, inferred from a zod schema.
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for a key,
   * or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Names of the sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   */
  unknownKeys(): string[]
}

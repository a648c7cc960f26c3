export class ConfigError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "ConfigError"
  }
}

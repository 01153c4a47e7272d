/**
 * Raised when a configuration file or the merged configuration is invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

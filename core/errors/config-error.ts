import type { ErrorKind } from '../../types/error-kind'

/** Invalid or missing configuration. */
export class ConfigError extends Error {
  public readonly kind = 'configuration' satisfies ErrorKind

  /**
   * Creates a new ConfigError.
   *
   * @param message - What is wrong with the configuration.
   * @param options - Standard error options (cause).
   */
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

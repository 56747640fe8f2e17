/**
 * ConfigError
 *
 * Thrown when the environment or command-line flags describe an unusable
 * configuration (unknown provider, missing API key, invalid values).
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ConfigError from unknown error with context
   */
  static fromError(context: string, error: unknown): ConfigError {
    return new ConfigError(
      `${context}: ${ConfigError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

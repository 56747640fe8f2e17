/**
 * ChunkPlanError
 *
 * Thrown when a page range or chunk size cannot be planned (non-integer
 * values, `start < 1`, `end < start`, `chunkSize < 1`).
 */
export class ChunkPlanError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ChunkPlanError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ChunkPlanError from unknown error with context
   */
  static fromError(context: string, error: unknown): ChunkPlanError {
    return new ChunkPlanError(
      `${context}: ${ChunkPlanError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * ArchiveOpenError
 *
 * Thrown when the EPUB container cannot be opened or has no usable root
 * package document (container.xml, rootfile, OPF or spine missing).
 */
export class ArchiveOpenError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ArchiveOpenError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ArchiveOpenError from unknown error with context
   */
  static fromError(context: string, error: unknown): ArchiveOpenError {
    return new ArchiveOpenError(
      `${context}: ${ArchiveOpenError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

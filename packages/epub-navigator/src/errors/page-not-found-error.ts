/**
 * PageNotFoundError
 *
 * Describes a page number with no entry in the page index. Range
 * extraction returns it inside a failed result instead of throwing.
 */
export class PageNotFoundError extends Error {
  readonly pageNumber: number;

  constructor(pageNumber: number, options?: ErrorOptions) {
    super(`Error: Start page ${pageNumber} not found.`, options);
    this.name = 'PageNotFoundError';
    this.pageNumber = pageNumber;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

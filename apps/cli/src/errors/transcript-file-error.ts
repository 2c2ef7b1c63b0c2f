/**
 * TranscriptFileError
 *
 * Thrown when a transcript cannot be read or its refined version cannot be
 * written. A batch records it for the file and moves on.
 */
export class TranscriptFileError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TranscriptFileError';
    this.path = path;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create TranscriptFileError from unknown error with context
   */
  static fromError(
    context: string,
    path: string,
    error: unknown,
  ): TranscriptFileError {
    return new TranscriptFileError(
      `${context}: ${TranscriptFileError.getErrorMessage(error)}`,
      path,
      { cause: error },
    );
  }
}

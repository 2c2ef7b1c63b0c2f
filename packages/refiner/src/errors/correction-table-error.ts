/**
 * CorrectionTableError
 *
 * Thrown while building a term dictionary whose table is invalid.
 * `problems` lists every issue found, one line each.
 */
export class CorrectionTableError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[], options?: ErrorOptions) {
    super(
      `Invalid correction table (${problems.length} problem${problems.length === 1 ? '' : 's'}):\n- ${problems.join('\n- ')}`,
      options,
    );
    this.name = 'CorrectionTableError';
    this.problems = problems;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create CorrectionTableError from unknown error with context
   */
  static fromError(context: string, error: unknown): CorrectionTableError {
    return new CorrectionTableError(
      [`${context}: ${CorrectionTableError.getErrorMessage(error)}`],
      { cause: error },
    );
  }
}

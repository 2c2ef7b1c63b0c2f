import type { z } from 'zod';

/**
 * ConfigError
 *
 * Thrown when the configuration file cannot be read or holds invalid values,
 * or when a flag or environment variable is out of range.
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

  /**
   * One line per zod issue, prefixed with the offending key
   */
  static fromZodError(source: string, error: z.ZodError): ConfigError {
    const details = error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    return new ConfigError(`Invalid configuration in ${source}:\n${details}`, {
      cause: error,
    });
  }
}

/**
 * Raised when the model's answer could not be turned into a valid object
 * after every structured-output attempt.
 */
export class StructuredOutputError extends Error {
  constructor(
    message: string,
    readonly lastText: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'StructuredOutputError';
  }
}

/**
 * ContractViolationError
 *
 * Thrown when a caller breaks a component's input contract: an empty or
 * malformed chunk handed to the invoker, or options outside their domain.
 * Signals a programming error upstream and is never recovered from.
 */
export class ContractViolationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ContractViolationError';
  }

  /**
   * Throws unless `condition` holds
   */
  static assert(condition: boolean, message: string): asserts condition {
    if (!condition) {
      throw new ContractViolationError(message);
    }
  }
}

/**
 * Raised when a caller breaks a precondition: wrong card count, bad
 * notation, duplicated known cards, out-of-range arguments.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Raised when the engine reaches a state its own logic should make
 * impossible. Never caught and turned into a default result.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Error classes for the predicates package
 */

/**
 * Base error class for all predicate-related errors
 */
export class PredicateError extends Error {
  constructor(message: string, public readonly code: string, public readonly context?: unknown) {
    super(message);
    this.name = 'PredicateError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a combinator is built without a required collaborator
 */
export class InvalidArgumentError extends PredicateError {
  constructor(
    public readonly argumentName: string,
    public readonly received: unknown,
    expected = 'a function'
  ) {
    super(
      `Invalid argument '${argumentName}': expected ${expected}, got ${received === null ? 'null' : typeof received}`,
      'INVALID_ARGUMENT',
      { argumentName, expected }
    );
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Returns `value` unchanged, or throws when it is not callable.
 * @throws {InvalidArgumentError}
 */
export const requireFunction = <F extends (...args: never[]) => unknown>(
  value: F,
  argumentName: string
): F => {
  if (typeof value !== 'function') {
    throw new InvalidArgumentError(argumentName, value);
  }
  return value;
};

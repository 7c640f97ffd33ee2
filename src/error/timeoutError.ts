import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a single attempt exceeds the configured timeout threshold.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  name = 'TimeoutError';
  /** Timeout that fired, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError for the given timeout */
  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Timeout that fired, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Returns the {@link TimeoutError} found in the error or its `cause` chain, if any.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}

import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error returned once every allowed attempt failed with a retryable error.
 * The last attempt's error is kept as `cause`.
 */
export class MaxRetriesExceededError extends Error {
  /** MaxRetriesExceededError error-name */
  static name = 'MaxRetriesExceededError';
  name = 'MaxRetriesExceededError';
  /** Internal number of attempts made */
  #attempts: number;

  /** Creates a new instance of a MaxRetriesExceededError with accompanying attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts made, including the first one */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Extract an {@link MaxRetriesExceededError} from an unknown error value, following nested causes.
 */
export function getMaxRetriesExceededError(error: unknown): null | MaxRetriesExceededError {
  return unwrapErrorType(MaxRetriesExceededError, error);
}

/**
 * Type guard for {@link MaxRetriesExceededError}.
 */
export function isMaxRetriesExceededError(error: unknown): error is MaxRetriesExceededError {
  return isErrorType(MaxRetriesExceededError, error);
}

import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Statuses treated as transient server failures. */
export const TRANSIENT_STATUSES: readonly number[] = [500, 502, 503, 504];

/**
 * Error representing a 500, 502, 503 or 504 response. The body is not decoded
 * and the call is always eligible for another attempt.
 */
export class TransientServerError extends HTTPError {
  /** TransientServerError error-name */
  static name = 'TransientServerError';
  name = 'TransientServerError';
}

/**
 * Type guard for {@link TransientServerError}.
 */
export function isTransientServerError(error: unknown): error is TransientServerError {
  return isErrorType(TransientServerError, error);
}

/**
 * Extract an {@link TransientServerError} from an unknown error value, following nested causes.
 */
export function getTransientServerError(error: unknown): null | TransientServerError {
  return unwrapErrorType(TransientServerError, error);
}

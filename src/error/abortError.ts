import { isErrorType } from './isErrorType.js';

/**
 * Error returned when a call is cancelled, either through the caller's
 * `AbortSignal` or because the client was disposed. Never retried.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}

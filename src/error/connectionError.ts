import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a transport failure: the request never produced an HTTP response
 * (DNS, refused or reset connection). Retried like an `api_connection_error`.
 */
export class ConnectionError extends Error {
  /** ConnectionError error-name */
  static name = 'ConnectionError';
  name = 'ConnectionError';
  /** Internal url that could not be reached */
  #url: string;

  /** Creates a new instance of a ConnectionError for the url that failed */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** Url that could not be reached */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link ConnectionError}.
 */
export function isConnectionError(error: unknown): error is ConnectionError {
  return isErrorType(ConnectionError, error);
}

/**
 * Extract an {@link ConnectionError} from an unknown error value, following nested causes.
 */
export function getConnectionError(error: unknown): null | ConnectionError {
  return unwrapErrorType(ConnectionError, error);
}

import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error wrapping an HTTP response that could not be turned into a result.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';
  name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: Response, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /**
   * Response causing the HTTPError. Its body has already been consumed.
   */
  get response(): Response {
    return this.#response;
  }

  /** HTTP status of the response */
  get status(): number {
    return this.#response.status;
  }

  /** Value of the `Request-Id` response header, when present */
  get requestId(): string | null {
    return this.#response.headers.get('request-id');
  }
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

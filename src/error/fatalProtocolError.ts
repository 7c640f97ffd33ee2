import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * - `unhandled_status`: the status is outside the known set.
 * - `invalid_body`: the body could not be parsed or decoded into the expected shape.
 */
export type FatalProtocolReason = 'unhandled_status' | 'invalid_body';

/** Request context kept on a {@link FatalProtocolError} for debugging. */
export interface ProtocolContext {
  /** Request url, relative to the endpoint */
  url: string;
  /** Form fields that were sent, if any */
  params?: Readonly<Record<string, string>>;
  /** Raw response body as received */
  rawBody: string;
}

/**
 * Error representing a response this client does not know how to interpret.
 * Never retried; the decode failure (if any) is kept as `cause`.
 */
export class FatalProtocolError extends HTTPError {
  /** FatalProtocolError error-name */
  static name = 'FatalProtocolError';
  name = 'FatalProtocolError';
  #reason: FatalProtocolReason;
  #context: ProtocolContext;

  /** Creates a new instance of a FatalProtocolError for the given response and request context */
  constructor(
    response: Response,
    reason: FatalProtocolReason,
    context: ProtocolContext,
    message: string = `error interpreting response with status ${response.status}`,
    opts?: ErrorOptions,
  ) {
    super(response, message, opts);
    this.#reason = reason;
    this.#context = context;
  }

  get reason(): FatalProtocolReason {
    return this.#reason;
  }

  get url(): string {
    return this.#context.url;
  }

  get params(): Readonly<Record<string, string>> | null {
    return this.#context.params ?? null;
  }

  get rawBody(): string {
    return this.#context.rawBody;
  }
}

/**
 * Type guard for {@link FatalProtocolError}.
 */
export function isFatalProtocolError(error: unknown): error is FatalProtocolError {
  return isErrorType(FatalProtocolError, error);
}

/**
 * Extract an {@link FatalProtocolError} from an unknown error value, following nested causes.
 */
export function getFatalProtocolError(error: unknown): null | FatalProtocolError {
  return unwrapErrorType(FatalProtocolError, error);
}

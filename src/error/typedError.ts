import { toCamelCase } from '../codec/case.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Value of `error.type` in an API error envelope. */
export const ErrorKind = {
  ApiConnectionError: 'api_connection_error',
  ApiError: 'api_error',
  AuthenticationError: 'authentication_error',
  CardError: 'card_error',
  InvalidRequestError: 'invalid_request_error',
  RateLimitError: 'rate_limit_error',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Value of `error.code` in an API error envelope. */
export const ErrorCode = {
  InvalidNumber: 'invalid_number',
  InvalidExpiryMonth: 'invalid_expiry_month',
  InvalidExpiryYear: 'invalid_expiry_year',
  InvalidCvc: 'invalid_cvc',
  IncorrectNumber: 'incorrect_number',
  ExpiredCard: 'expired_card',
  IncorrectCvc: 'incorrect_cvc',
  IncorrectZip: 'incorrect_zip',
  CardDeclined: 'card_declined',
  Missing: 'missing',
  ProcessingError: 'processing_error',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Decoded `error` object of an API error envelope. */
export interface ErrorBody {
  kind: ErrorKind;
  code: ErrorCode | null;
  message: string | null;
  param: string | null;
}

/** Statuses that carry a typed error envelope. */
export type TypedErrorStatus = 400 | 401 | 402 | 404 | 429;

/** Options accepted by every {@link TypedError}. */
export interface TypedErrorOptions extends ErrorOptions {
  /** Value of the `Request-Id` response header */
  requestId?: string | null;
}

/**
 * API error whose body decoded into an error envelope.
 * The variant is chosen by HTTP status; `kind` and `code` come from the body.
 */
export abstract class TypedError extends Error {
  /** TypedError error-name */
  static name = 'TypedError';
  abstract readonly httpStatus: TypedErrorStatus;
  #body: ErrorBody;
  #requestId: string | null;

  constructor(body: ErrorBody, opts?: TypedErrorOptions) {
    super(body.message ?? (body.code ? `${body.kind}: ${body.code}` : body.kind), opts);
    this.#body = body;
    this.#requestId = opts?.requestId ?? null;
  }

  /** Decoded error envelope */
  get body(): ErrorBody {
    return this.#body;
  }

  get kind(): ErrorKind {
    return this.#body.kind;
  }

  get code(): ErrorCode | null {
    return this.#body.code;
  }

  /** Offending request parameter, as named on the wire */
  get param(): string | null {
    return this.#body.param;
  }

  /** Offending request parameter in camelCase, matching the input field names */
  get field(): string | null {
    return this.#body.param === null ? null : toCamelCase(this.#body.param);
  }

  get requestId(): string | null {
    return this.#requestId;
  }
}

/** 400: the request was malformed, often a missing parameter. */
export class BadRequestError extends TypedError {
  static name = 'BadRequestError';
  name = 'BadRequestError';
  readonly httpStatus = 400;
}

/** 401: no valid API key was provided. */
export class UnauthorizedError extends TypedError {
  static name = 'UnauthorizedError';
  name = 'UnauthorizedError';
  readonly httpStatus = 401;
}

/** 402: parameters were valid but the request failed, e.g. a declined card. */
export class RequestFailedError extends TypedError {
  static name = 'RequestFailedError';
  name = 'RequestFailedError';
  readonly httpStatus = 402;
}

/** 404: the requested resource does not exist. */
export class NotFoundError extends TypedError {
  static name = 'NotFoundError';
  name = 'NotFoundError';
  readonly httpStatus = 404;
}

/** 429: too many requests hit the API too quickly. Always retried. */
export class TooManyRequestsError extends TypedError {
  static name = 'TooManyRequestsError';
  name = 'TooManyRequestsError';
  readonly httpStatus = 429;
}

/**
 * Type guard for {@link TypedError}.
 */
export function isTypedError(error: unknown): error is TypedError {
  return isErrorType(TypedError, error);
}

/**
 * Extract a {@link TypedError} from an unknown error value, following nested causes.
 */
export function getTypedError(error: unknown): null | TypedError {
  return unwrapErrorType(TypedError, error);
}

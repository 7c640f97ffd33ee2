import { z } from 'zod';
import { tryParse } from '../utils/tryParse.js';
import { ConnectionError } from './connectionError.js';
import { FatalProtocolError } from './fatalProtocolError.js';
import { TimeoutError } from './timeoutError.js';
import { TRANSIENT_STATUSES, TransientServerError } from './transientServerError.js';
import {
  BadRequestError,
  type ErrorBody,
  ErrorCode,
  ErrorKind,
  NotFoundError,
  RequestFailedError,
  TooManyRequestsError,
  TypedError,
  type TypedErrorOptions,
  type TypedErrorStatus,
  UnauthorizedError,
} from './typedError.js';
import { ValidationError } from './validationError.js';

/** Wire shape of an API error response. Enum values are matched case-insensitively. */
export const errorEnvelopeSchema = z.object({
  error: z.object({
    type: z.string().toLowerCase().pipe(z.nativeEnum(ErrorKind)),
    code: z.string().toLowerCase().pipe(z.nativeEnum(ErrorCode)).nullish(),
    message: z.string().nullish(),
    param: z.string().nullish(),
  }),
});

/** Every error a non-2xx response can turn into. */
export type ClassifiedError = TypedError | TransientServerError | FatalProtocolError;

/** Request details attached to protocol errors. */
export interface ClassifyContext {
  url: string;
  params?: Readonly<Record<string, string>>;
}

const TYPED_ERRORS: Record<TypedErrorStatus, new (body: ErrorBody, opts?: TypedErrorOptions) => TypedError> = {
  400: BadRequestError,
  401: UnauthorizedError,
  402: RequestFailedError,
  404: NotFoundError,
  429: TooManyRequestsError,
};

function isTypedErrorStatus(status: number): status is TypedErrorStatus {
  return status in TYPED_ERRORS;
}

/**
 * Maps a non-2xx response to its error variant. Pure: only the status, the
 * `Request-Id` header and the already-read body are inspected.
 *
 * - 500/502/503/504 → {@link TransientServerError}, body ignored.
 * - 400/401/402/404/429 → the matching {@link TypedError} when the body is an error envelope,
 *   otherwise {@link FatalProtocolError} with reason `invalid_body`.
 * - anything else → {@link FatalProtocolError} with reason `unhandled_status`.
 */
export function classifyError(response: Response, rawBody: string, context: ClassifyContext): ClassifiedError {
  const { status } = response;

  if (TRANSIENT_STATUSES.includes(status)) {
    return new TransientServerError(response, `error server responded with ${status} for ${context.url}`);
  }

  if (!isTypedErrorStatus(status)) {
    return new FatalProtocolError(
      response,
      'unhandled_status',
      { ...context, rawBody },
      `error unhandled status ${status} for ${context.url}`,
    );
  }

  const parsed = errorEnvelopeSchema.safeParse(tryParse(rawBody));
  if (!parsed.success) {
    return new FatalProtocolError(
      response,
      'invalid_body',
      { ...context, rawBody },
      `error decoding error body of ${status} response for ${context.url}`,
      { cause: new ValidationError('error validating error envelope', parsed.error.issues) },
    );
  }

  const { type, code, message, param } = parsed.data.error;
  const TypedVariant = TYPED_ERRORS[status];

  return new TypedVariant(
    { kind: type, code: code ?? null, message: message ?? null, param: param ?? null },
    { requestId: response.headers.get('request-id') },
  );
}

/**
 * Whether another attempt may succeed where this one failed.
 *
 * Retried: {@link TooManyRequestsError} of any kind, a {@link RequestFailedError} of kind
 * `api_error` or `api_connection_error`, {@link TransientServerError},
 * {@link ConnectionError} and {@link TimeoutError}. 400, 401 and 404 are never retried.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TooManyRequestsError) {
    return true;
  }

  if (error instanceof RequestFailedError) {
    return error.kind === ErrorKind.ApiError || error.kind === ErrorKind.ApiConnectionError;
  }

  if (error instanceof TypedError) {
    return false;
  }

  return error instanceof TransientServerError || error instanceof ConnectionError || error instanceof TimeoutError;
}

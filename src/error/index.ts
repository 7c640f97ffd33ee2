/**
 * Error entrypoint: the error taxonomy of the client plus helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the core client.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export {
  type ClassifiedError,
  type ClassifyContext,
  classifyError,
  errorEnvelopeSchema,
  isRetryableError,
} from './classify.js';
export { ConnectionError, getConnectionError, isConnectionError } from './connectionError.js';
export {
  FatalProtocolError,
  type FatalProtocolReason,
  getFatalProtocolError,
  isFatalProtocolError,
  type ProtocolContext,
} from './fatalProtocolError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { isErrorType } from './isErrorType.js';
export {
  getMaxRetriesExceededError,
  isMaxRetriesExceededError,
  MaxRetriesExceededError,
} from './maxRetriesExceededError.js';
export {
  isStatementDescriptorError,
  type StatementDescriptorError,
  StatementDescriptorInvalidCharacterError,
  StatementDescriptorTooLongError,
} from './statementDescriptorError.js';
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
export {
  getTransientServerError,
  isTransientServerError,
  TRANSIENT_STATUSES,
  TransientServerError,
} from './transientServerError.js';
export {
  BadRequestError,
  type ErrorBody,
  ErrorCode,
  ErrorKind,
  getTypedError,
  isTypedError,
  NotFoundError,
  RequestFailedError,
  TooManyRequestsError,
  TypedError,
  type TypedErrorOptions,
  type TypedErrorStatus,
  UnauthorizedError,
} from './typedError.js';
export {
  getUnknownVariantError,
  isUnknownVariantError,
  type UnknownVariant,
  UnknownVariantError,
} from './unknownVariantError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';

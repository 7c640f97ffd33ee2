/**
 * Core entrypoint: exports the client, the single-attempt executor and the retry machinery.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Client that encodes, sends, decodes and retries calls against the API.
 */
export { StripeClient } from './client.js';

/** Secret key and base url wrappers. */
export { ApiKey, Endpoint } from './credentials.js';

/** Performs exactly one physical attempt per call. */
export { RequestExecutor, type RequestExecutorProps } from './executor.js';

/** One key per logical mutation, reused by every attempt. */
export { IdempotencyKey, type IdempotentOptions, withIdempotency } from './idempotency.js';

export type {
  AttemptError,
  AttemptOptions,
  CallError,
  CallOptions,
  GetOptions,
  MutationOptions,
  StripeClientProps,
} from './types.js';

/** Retry state machine and its sequential driver. */
export { type RetryOptions, type RetryPolicy, type RetryState, retry, transition } from '../utils/retry.js';

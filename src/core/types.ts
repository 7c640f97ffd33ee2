import type { Logger } from 'pino';
import type { FormInput } from '../codec/form.js';
import type { AbortError } from '../error/abortError.js';
import type { ClassifiedError } from '../error/classify.js';
import type { ConnectionError } from '../error/connectionError.js';
import type { MaxRetriesExceededError } from '../error/maxRetriesExceededError.js';
import type { TimeoutError } from '../error/timeoutError.js';
import type { FetchClientProvider } from '../types/request.js';
import type { ApiKey, Endpoint } from './credentials.js';
import type { IdempotencyKey } from './idempotency.js';

/** Every error a single physical attempt can end with. */
export type AttemptError = ClassifiedError | ConnectionError | TimeoutError | AbortError;

/** Every error a logical call can end with, retries included. */
export type CallError = AttemptError | MaxRetriesExceededError;

/** Options of one physical attempt, see {@link RequestExecutor}. */
export interface AttemptOptions {
  /** Sent as `Idempotency-Key` on POST and DELETE */
  idempotencyKey?: IdempotencyKey;
  /** Connected account the request acts on behalf of, sent as `Stripe-Account` */
  stripeAccount?: string;
  /** Cancels the attempt */
  signal?: AbortSignal;
  /** Overrides the executor timeout, in milliseconds; `false` disables it */
  timeout?: number | false;
}

/** Options shared by every client call. */
export interface CallOptions {
  /** Connected account the call acts on behalf of */
  stripeAccount?: string;
  /** Cancels the call; no further attempt starts once aborted */
  signal?: AbortSignal;
  /** Overrides the client's retry budget */
  maxRetries?: number;
  /** Overrides the client's per-attempt timeout */
  timeout?: number | false;
}

/** Options for {@link StripeClient.get}. */
export interface GetOptions extends CallOptions {
  /** Query parameters, encoded like form bodies */
  query?: FormInput;
}

/** Options for mutating calls, {@link StripeClient.post} and {@link StripeClient.delete}. */
export interface MutationOptions extends CallOptions {
  /**
   * Key shared by every attempt of this call.
   * A fresh one is generated when omitted.
   */
  idempotencyKey?: IdempotencyKey | string;
}

/** Configuration for constructing a {@link StripeClient}. */
export interface StripeClientProps {
  /** Secret key, sent as the Basic auth username */
  apiKey: ApiKey | string;
  /** Base url of the API. @default 'https://api.stripe.com' */
  endpoint?: Endpoint | string;
  /** HTTP client implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /**
   * Retries after the first attempt of a call.
   * @default 2
   */
  maxRetries?: number;
  /**
   * Milliseconds between attempts.
   * @default 500
   */
  retryDelay?: number;
  /**
   * Per-attempt timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
  /** Pinned API version, sent as `Stripe-Version` */
  apiVersion?: string;
  /** Logger for request and retry records. Defaults to {@link createLogger}. */
  logger?: Logger;
}

import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Logger } from 'pino';
import { encodeForm, type FormInput } from '../codec/form.js';
import { AbortError } from '../error/abortError.js';
import { isRetryableError } from '../error/classify.js';
import { FetchClient } from '../fetch/client.js';
import { createLogger } from '../logger.js';
import type { DeleteResponse } from '../models/deleteResponse.js';
import { retry } from '../utils/retry.js';
import { mergeSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ApiKey, Endpoint } from './credentials.js';
import { RequestExecutor } from './executor.js';
import { IdempotencyKey, withIdempotency } from './idempotency.js';
import type { AttemptError, CallError, CallOptions, GetOptions, MutationOptions, StripeClientProps } from './types.js';

/**
 * Client for the payments API that:
 * - authenticates every request with the secret key,
 * - encodes bodies and queries as forms and decodes responses with schemas,
 * - retries transient failures, reusing one idempotency key per mutating call.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export class StripeClient {
  /** Performs single attempts. */
  #executor: RequestExecutor;
  /** Default retries after the first attempt. */
  #maxRetries: number;
  /** Milliseconds between attempts. */
  #retryDelay: number;
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController: AbortController;

  /**
   * Creates a client wired to the given endpoint and transport.
   *
   * @param props - Credentials, transport and retry policy.
   */
  constructor({
    apiKey,
    endpoint,
    fetchProvider = FetchClient,
    maxRetries = 2,
    retryDelay = 500,
    timeout = 60_000,
    apiVersion,
    logger = createLogger(),
  }: StripeClientProps) {
    this.#maxRetries = maxRetries;
    this.#retryDelay = retryDelay;
    this.#logger = logger;
    this.#abortController = new AbortController();
    this.#executor = new RequestExecutor({
      apiKey: typeof apiKey === 'string' ? new ApiKey(apiKey) : apiKey,
      endpoint: endpoint instanceof Endpoint ? endpoint : new Endpoint(endpoint),
      fetchProvider,
      logger,
      timeout,
      apiVersion,
    });
  }

  /**
   * Reads a resource. Retried without an idempotency key, since reads are safe to repeat.
   *
   * @example
   * const [err, charge] = await client.get('/v1/charges/ch_123', chargeSchema);
   */
  get<T extends StandardSchemaV1>(
    path: string,
    schema: T,
    { query, ...opts }: GetOptions = {},
  ): SafeWrapAsync<CallError, StandardSchemaV1.InferOutput<T>> {
    const signal = this.#signal(opts.signal);
    const fields = query ? encodeForm(query) : {};

    return retry({
      fn: () =>
        this.#executor.get(path, schema, {
          query: fields,
          stripeAccount: opts.stripeAccount,
          signal,
          timeout: opts.timeout,
        }),
      ...this.#policy('GET', path, signal, opts),
    });
  }

  /**
   * Creates or updates a resource. `input` is form-encoded; every attempt carries
   * the same idempotency key.
   *
   * @example
   * const [err, customer] = await client.post('/v1/customers', { email: 'a@example.com' }, customerSchema);
   */
  post<T extends StandardSchemaV1>(
    path: string,
    input: FormInput,
    schema: T,
    { idempotencyKey, ...opts }: MutationOptions = {},
  ): SafeWrapAsync<CallError, StandardSchemaV1.InferOutput<T>> {
    const signal = this.#signal(opts.signal);
    const form = encodeForm(input);

    return withIdempotency({
      idempotencyKey: toIdempotencyKey(idempotencyKey),
      run: (key) =>
        this.#executor.post(path, form, schema, {
          idempotencyKey: key,
          stripeAccount: opts.stripeAccount,
          signal,
          timeout: opts.timeout,
        }),
      ...this.#policy('POST', path, signal, opts),
    });
  }

  /**
   * Deletes a resource under one idempotency key.
   */
  delete(path: string, { idempotencyKey, ...opts }: MutationOptions = {}): SafeWrapAsync<CallError, DeleteResponse> {
    const signal = this.#signal(opts.signal);

    return withIdempotency({
      idempotencyKey: toIdempotencyKey(idempotencyKey),
      run: (key) =>
        this.#executor.delete(path, {
          idempotencyKey: key,
          stripeAccount: opts.stripeAccount,
          signal,
          timeout: opts.timeout,
        }),
      ...this.#policy('DELETE', path, signal, opts),
    });
  }

  /**
   * Cancels in-flight calls and disposes the transport.
   * Calls made afterwards end with an {@link AbortError}.
   */
  dispose() {
    this.#abortController.abort(new AbortError('error client was disposed'));
    this.#executor.dispose();
  }

  #signal(signal?: AbortSignal): AbortSignal {
    return mergeSignals([this.#abortController.signal, signal]) ?? this.#abortController.signal;
  }

  #policy(method: string, path: string, signal: AbortSignal, opts: CallOptions) {
    return {
      isRetryable: isRetryableError,
      maxRetries: opts.maxRetries ?? this.#maxRetries,
      delay: this.#retryDelay,
      signal,
      onRetry: (error: AttemptError, attempt: number) => {
        this.#logger.debug({ method, path, attempt, err: error }, 'retrying request');
      },
    };
  }
}

function toIdempotencyKey(key?: IdempotencyKey | string): IdempotencyKey | undefined {
  return typeof key === 'string' ? IdempotencyKey.from(key) : key;
}

import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Logger } from 'pino';
import { decode } from '../codec/decode.js';
import type { FormFields } from '../codec/form.js';
import { AbortError, isAbortError } from '../error/abortError.js';
import { classifyError } from '../error/classify.js';
import { ConnectionError } from '../error/connectionError.js';
import { FatalProtocolError } from '../error/fatalProtocolError.js';
import { getTimeoutError } from '../error/timeoutError.js';
import { type DeleteResponse, deleteResponseSchema } from '../models/deleteResponse.js';
import type { FetchClientProvider, FetchClientProviderDefinition, HttpMethod } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { readBody } from '../utils/readBody.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { ApiKey, Endpoint } from './credentials.js';
import type { AttemptError, AttemptOptions } from './types.js';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/** Configuration for a {@link RequestExecutor}. */
export interface RequestExecutorProps {
  apiKey: ApiKey;
  endpoint: Endpoint;
  fetchProvider: FetchClientProvider;
  logger: Logger;
  /** Default per-attempt timeout in milliseconds, `false` to disable */
  timeout: number | false;
  apiVersion?: string;
}

/**
 * Performs exactly one physical attempt per call: builds the request, sends it,
 * and turns the response into a decoded value or a classified error. Retrying is
 * left to the caller.
 */
export class RequestExecutor {
  #fetchClient: FetchClientProviderDefinition;
  #logger: Logger;
  #timeout: number | false;

  constructor({ apiKey, endpoint, fetchProvider, logger, timeout, apiVersion }: RequestExecutorProps) {
    this.#logger = logger;
    this.#timeout = timeout;
    this.#fetchClient = new fetchProvider(endpoint.url, {
      headers: {
        Accept: 'application/json',
        Authorization: apiKey.authorization(),
        'Stripe-Version': apiVersion,
      },
    });
  }

  /** Sends a GET with `query` in the url. Never carries an idempotency key. */
  get<T extends StandardSchemaV1>(
    path: string,
    schema: T,
    { query = {}, ...opts }: Omit<AttemptOptions, 'idempotencyKey'> & { query?: FormFields } = {},
  ): SafeWrapAsync<AttemptError, StandardSchemaV1.InferOutput<T>> {
    return this.#send('get', path, query, schema, opts);
  }

  /** Sends a form-encoded POST. */
  post<T extends StandardSchemaV1>(
    path: string,
    form: FormFields,
    schema: T,
    opts: AttemptOptions = {},
  ): SafeWrapAsync<AttemptError, StandardSchemaV1.InferOutput<T>> {
    return this.#send('post', path, form, schema, opts);
  }

  /** Sends a DELETE, decoding the `{ id, deleted }` acknowledgement. */
  delete(path: string, opts: AttemptOptions = {}): SafeWrapAsync<AttemptError, DeleteResponse> {
    return this.#send('delete', path, {}, deleteResponseSchema, opts);
  }

  /** Disposes the underlying HTTP provider. */
  dispose() {
    this.#fetchClient.dispose?.();
  }

  async #send<T extends StandardSchemaV1>(
    method: HttpMethod,
    path: string,
    params: FormFields,
    schema: T,
    { idempotencyKey, stripeAccount, signal, timeout = this.#timeout }: AttemptOptions,
  ): SafeWrapAsync<AttemptError, StandardSchemaV1.InferOutput<T>> {
    const verb = method.toUpperCase();
    const url = method === 'get' ? constructUrl(path, params) : constructUrl(path);
    const headers = {
      'Idempotency-Key': method === 'get' ? undefined : idempotencyKey?.value,
      'Stripe-Account': stripeAccount,
    };
    const merged = mergeSignals([signal, createTimeoutSignal(timeout)]) ?? undefined;

    this.#logger.debug({ method: verb, url, params }, 'sending request');

    const [errFetch, response] =
      method === 'post'
        ? await this.#fetchClient.post(url, {
            headers: { ...headers, 'Content-Type': FORM_CONTENT_TYPE },
            body: new URLSearchParams(params).toString(),
            signal: merged,
          })
        : await this.#fetchClient[method](url, { headers, signal: merged });

    if (errFetch) {
      return [this.#transportError(errFetch, url, signal), null];
    }

    const [errBody, rawBody] = await readBody(response);
    if (errBody) {
      return [this.#transportError(errBody, url, signal), null];
    }

    this.#logger.debug(
      { method: verb, url, status: response.status, requestId: response.headers.get('request-id') },
      'received response',
    );

    const context = { url, params, rawBody };
    if (!response.ok) {
      return [classifyError(response, rawBody, context), null];
    }

    const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(rawBody));
    if (errJson) {
      return [
        new FatalProtocolError(response, 'invalid_body', context, `error parsing response body of ${url}`, {
          cause: errJson,
        }),
        null,
      ];
    }

    const [errDecode, value] = await decode(schema, json);
    if (errDecode) {
      return [
        new FatalProtocolError(response, 'invalid_body', context, `error decoding response body of ${url}`, {
          cause: errDecode,
        }),
        null,
      ];
    }

    return [null, value];
  }

  /** Names a failure that happened before a full response was read. */
  #transportError(error: Error, url: string, signal?: AbortSignal): AttemptError {
    const timeout = getTimeoutError(error);
    if (timeout) {
      return timeout;
    }

    if (signal?.aborted || isAbortError(error)) {
      return new AbortError(`error request to ${url} was cancelled`, { cause: error });
    }

    return new ConnectionError(`error connecting to ${url}`, url, { cause: error });
  }
}

import type { FetchClientOptions, FetchOptions, HttpMethod } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Every HTTP status resolves to a response; only transport failures are errors.
 */
export class FetchClient {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Default fetch options. */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `v1/charges/ch_123`).
   * @param opts - Request options merged with the client's defaults.
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('get', endpoint, { ...opts, body: undefined });
  }

  /**
   * Executes a POST request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `v1/charges`).
   * @param opts - Request options, `body` being the url-encoded form.
   */
  public post(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('post', endpoint, opts);
  }

  /**
   * Executes a DELETE request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `v1/customers/cus_123`).
   * @param opts - Request options merged with the client's defaults.
   */
  public delete(endpoint: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request('delete', endpoint, { ...opts, body: undefined });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   * Network / fetch errors are wrapped in `Error`, keeping the original as `cause`.
   */
  async #request(method: HttpMethod, endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const verb = method.toUpperCase();
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.constructPath(endpoint), {
        body: opts.body,
        method: verb,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${verb} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   */
  private constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}

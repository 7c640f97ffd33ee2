import type { SafeWrapAsync } from '../utils/wrap.js';

/** HTTP methods the API uses. */
export type HttpMethod = 'get' | 'post' | 'delete';

/** Header options accepted by the fetch wrapper. `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Url-encoded request body. */
  body?: string;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options to configure a fetch provider. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
}

/** Contract for HTTP client implementations used by the request executor. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, Response>;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}

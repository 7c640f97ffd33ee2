/**
 * Secret API key. Renders as `ApiKey([REDACTED])` wherever it is printed, logged or serialized;
 * the key itself only leaves through {@link ApiKey.authorization}.
 */
export class ApiKey {
  #key: string;

  constructor(key: string) {
    this.#key = key;
  }

  /** `Authorization` header value: HTTP Basic with the key as username and an empty password. */
  authorization(): string {
    return `Basic ${Buffer.from(`${this.#key}:`).toString('base64')}`;
  }

  toString(): string {
    return 'ApiKey([REDACTED])';
  }

  toJSON(): string {
    return this.toString();
  }
}

/** Base url of the API, without trailing slash. */
export class Endpoint {
  static readonly DEFAULT = 'https://api.stripe.com';
  readonly url: string;

  constructor(url: string = Endpoint.DEFAULT) {
    this.url = url.replace(/\/+$/, '');
  }

  toString(): string {
    return this.url;
  }
}

import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { z } from 'zod';
import { AbortError } from '../error/abortError.js';
import { MaxRetriesExceededError } from '../error/maxRetriesExceededError.js';
import { TransientServerError } from '../error/transientServerError.js';
import { RequestFailedError, TooManyRequestsError, TypedError, UnauthorizedError } from '../error/typedError.js';
import type { FetchClientOptions, FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { StripeClient } from './client.js';
import { IdempotencyKey } from './idempotency.js';

const itemSchema = z.object({ id: z.string() });

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status });
}

function errorResponse(status: number, type: string, code: string | null = null) {
  return jsonResponse({ error: { type, code, message: null, param: null } }, status);
}

function sentHeader(mocked: Mock<typeof fetch>, call: number, name: string) {
  return new Headers(mocked.mock.calls[call]?.[1]?.headers).get(name);
}

function createClient(opts: { maxRetries?: number } = {}) {
  return new StripeClient({
    apiKey: 'sk_test_placeholder',
    endpoint: 'https://api.example.com',
    retryDelay: 0,
    timeout: false,
    ...opts,
  });
}

describe('StripeClient', () => {
  const originalFetch = global.fetch;
  let mockedFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    global.fetch = mockedFetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  describe('retries', () => {
    it('recovers from api connection errors under one idempotency key', async () => {
      mockedFetch
        .mockResolvedValueOnce(errorResponse(402, 'api_connection_error'))
        .mockResolvedValueOnce(errorResponse(402, 'api_connection_error'))
        .mockResolvedValueOnce(jsonResponse({ id: 'ch_1' }));

      const [err, charge] = await createClient().post('/v1/charges', { amount: 2000 }, itemSchema);

      expect(err).toBeNull();
      expect(charge).toEqual({ id: 'ch_1' });
      expect(mockedFetch).toHaveBeenCalledTimes(3);

      const key = sentHeader(mockedFetch, 0, 'idempotency-key');
      expect(key).toMatch(/^[0-9a-f-]{36}$/);
      expect(sentHeader(mockedFetch, 1, 'idempotency-key')).toBe(key);
      expect(sentHeader(mockedFetch, 2, 'idempotency-key')).toBe(key);
    });

    it('gives up after maxRetries + 1 attempts', async () => {
      mockedFetch.mockImplementation(() => Promise.resolve(new Response('', { status: 503 })));

      const [err, data] = await createClient({ maxRetries: 3 }).get('/v1/charges/ch_1', itemSchema);

      expect(data).toBeNull();
      expect(mockedFetch).toHaveBeenCalledTimes(4);
      expect(err).toBeInstanceOf(MaxRetriesExceededError);
      if (err instanceof MaxRetriesExceededError) {
        expect(err.attempts).toBe(4);
        expect(err.cause).toBeInstanceOf(TransientServerError);
      }
    });

    it('honours a per-call retry budget', async () => {
      mockedFetch.mockImplementation(() => Promise.resolve(new Response('', { status: 502 })));

      const [err] = await createClient().get('/v1/charges/ch_1', itemSchema, { maxRetries: 0 });

      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(MaxRetriesExceededError);
    });

    it('does not retry card errors', async () => {
      mockedFetch.mockResolvedValueOnce(errorResponse(402, 'card_error', 'card_declined'));

      const [err] = await createClient().post('/v1/charges', { amount: 2000 }, itemSchema);

      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(RequestFailedError);
    });

    it('does not retry authentication errors', async () => {
      mockedFetch.mockResolvedValueOnce(errorResponse(401, 'authentication_error'));

      const [err] = await createClient().get('/v1/charges/ch_1', itemSchema);

      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(UnauthorizedError);
    });

    it.each([400, 401, 404])('does not retry an api error answered with %i', async (status) => {
      mockedFetch.mockImplementation(() => Promise.resolve(errorResponse(status, 'api_error')));

      const [err] = await createClient().post('/v1/charges', { amount: 2000 }, itemSchema);

      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(TypedError);
      expect(err).not.toBeInstanceOf(MaxRetriesExceededError);
    });

    it('retries rate limiting', async () => {
      mockedFetch
        .mockResolvedValueOnce(errorResponse(429, 'rate_limit_error'))
        .mockResolvedValueOnce(jsonResponse({ id: 'ch_1' }));

      const [err, charge] = await createClient().get('/v1/charges/ch_1', itemSchema);

      expect(err).toBeNull();
      expect(charge).toEqual({ id: 'ch_1' });
      expect(mockedFetch).toHaveBeenCalledTimes(2);
    });

    it('returns the last typed error inside MaxRetriesExceededError', async () => {
      mockedFetch.mockImplementation(() => Promise.resolve(errorResponse(429, 'rate_limit_error')));

      const [err] = await createClient({ maxRetries: 1 }).get('/v1/charges/ch_1', itemSchema);

      expect(err).toBeInstanceOf(MaxRetriesExceededError);
      expect(err?.cause).toBeInstanceOf(TooManyRequestsError);
    });

    it('never sends an idempotency key on GET, even when retrying', async () => {
      mockedFetch
        .mockResolvedValueOnce(new Response('', { status: 500 }))
        .mockResolvedValueOnce(jsonResponse({ id: 'ch_1' }));

      await createClient().get('/v1/charges/ch_1', itemSchema);

      expect(sentHeader(mockedFetch, 0, 'idempotency-key')).toBeNull();
      expect(sentHeader(mockedFetch, 1, 'idempotency-key')).toBeNull();
    });
  });

  describe('idempotency', () => {
    it('uses the key supplied by the caller', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ id: 'cus_1', deleted: true }));

      await createClient().delete('/v1/customers/cus_1', { idempotencyKey: 'order-17' });

      expect(sentHeader(mockedFetch, 0, 'idempotency-key')).toBe('order-17');
    });

    it('accepts an IdempotencyKey instance', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ id: 'ch_1' }));

      await createClient().post('/v1/charges', {}, itemSchema, { idempotencyKey: IdempotencyKey.from('order-18') });

      expect(sentHeader(mockedFetch, 0, 'idempotency-key')).toBe('order-18');
    });

    it('mints a different key for every logical call', async () => {
      mockedFetch.mockImplementation(() => Promise.resolve(jsonResponse({ id: 'ch_1' })));
      const client = createClient();

      await client.post('/v1/charges', { amount: 1 }, itemSchema);
      await client.post('/v1/charges', { amount: 1 }, itemSchema);

      expect(sentHeader(mockedFetch, 0, 'idempotency-key')).not.toBe(sentHeader(mockedFetch, 1, 'idempotency-key'));
    });
  });

  describe('encoding', () => {
    it('form-encodes post input with snake_case keys', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ id: 'cus_1' }));

      await createClient().post(
        '/v1/customers',
        { email: 'a@example.com', shipping: { name: 'A', address: { line1: 'Main St 1', postalCode: '0150' } } },
        itemSchema,
      );

      expect(mockedFetch.mock.calls[0]?.[1]?.body).toBe(
        'email=a%40example.com&shipping%5Bname%5D=A&shipping%5Baddress%5D%5Bline1%5D=Main+St+1&shipping%5Baddress%5D%5Bpostal_code%5D=0150',
      );
    });

    it('encodes the query of GET calls', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ id: 'ch_1' }));

      await createClient().get('/v1/charges', itemSchema, { query: { limit: 3, startingAfter: 'ch_0' } });

      expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://api.example.com/v1/charges?limit=3&starting_after=ch_0');
    });

    it('routes calls to a connected account', async () => {
      mockedFetch.mockResolvedValueOnce(jsonResponse({ id: 'tr_1' }));

      await createClient().get('/v1/transfers/tr_1', itemSchema, { stripeAccount: 'acct_1' });

      expect(sentHeader(mockedFetch, 0, 'stripe-account')).toBe('acct_1');
    });
  });

  describe('cancellation', () => {
    it('stops retrying once the caller aborts', async () => {
      const controller = new AbortController();
      mockedFetch.mockImplementation(() => {
        controller.abort();
        return Promise.resolve(new Response('', { status: 503 }));
      });

      const [err] = await createClient().get('/v1/charges/ch_1', itemSchema, { signal: controller.signal });

      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(err).toBeInstanceOf(AbortError);
    });

    it('aborts every call after dispose', async () => {
      const client = createClient();
      client.dispose();

      const [err] = await client.get('/v1/charges/ch_1', itemSchema);

      expect(mockedFetch).not.toHaveBeenCalled();
      expect(err).toBeInstanceOf(AbortError);
    });
  });

  describe('fetchProvider', () => {
    it('sends requests through a custom provider', async () => {
      const calls: string[] = [];
      class RecordingProvider implements FetchClientProviderDefinition {
        constructor(
          readonly baseUrl: string,
          readonly opts: FetchClientOptions,
        ) {}

        get(url: string): SafeWrapAsync<Error, Response> {
          calls.push(`GET ${this.baseUrl}/${url}`);
          return Promise.resolve([null, jsonResponse({ id: 'ch_1' })]);
        }

        post(url: string, options: FetchOptions): SafeWrapAsync<Error, Response> {
          calls.push(`POST ${this.baseUrl}/${url} ${options.body}`);
          return Promise.resolve([null, jsonResponse({ id: 'ch_1' })]);
        }

        delete(url: string): SafeWrapAsync<Error, Response> {
          calls.push(`DELETE ${this.baseUrl}/${url}`);
          return Promise.resolve([null, jsonResponse({ id: 'ch_1', deleted: true })]);
        }

        dispose = vi.fn();
      }

      const client = new StripeClient({
        apiKey: 'sk_test_placeholder',
        endpoint: 'http://localhost:12111/',
        fetchProvider: RecordingProvider,
      });

      await client.get('/v1/charges/ch_1', itemSchema);
      await client.post('/v1/charges', { amount: 5 }, itemSchema);
      await client.delete('/v1/charges/ch_1');

      expect(calls).toEqual([
        'GET http://localhost:12111/v1/charges/ch_1',
        'POST http://localhost:12111/v1/charges amount=5',
        'DELETE http://localhost:12111/v1/charges/ch_1',
      ]);
    });
  });
});

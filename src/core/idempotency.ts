import { randomUUID } from 'node:crypto';
import { type RetryOptions, retry } from '../utils/retry.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Key that lets the API recognise repeated attempts of one logical mutation.
 * One key per logical call, reused verbatim by every attempt of that call.
 */
export class IdempotencyKey {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /** Mints a fresh random key. */
  static generate(): IdempotencyKey {
    return new IdempotencyKey(randomUUID());
  }

  /** Wraps a key chosen by the caller, e.g. one persisted alongside an order. */
  static from(value: string): IdempotencyKey {
    return new IdempotencyKey(value);
  }

  toString(): string {
    return this.value;
  }
}

/** Options for {@link withIdempotency}. */
export interface IdempotentOptions<R, E extends Error> extends Omit<RetryOptions<R, E>, 'fn'> {
  /** Key to use instead of minting one */
  idempotencyKey?: IdempotencyKey;
  /** Performs one attempt with the call's key */
  run: (key: IdempotencyKey, attempt: number) => SafeWrapAsync<E, R>;
}

/**
 * Retries `run` under a single idempotency key: the key is fixed before the first
 * attempt and handed unchanged to every later one.
 */
export function withIdempotency<R, E extends Error>({
  idempotencyKey = IdempotencyKey.generate(),
  run,
  ...opts
}: IdempotentOptions<R, E>) {
  return retry<R, E>({ ...opts, fn: (attempt) => run(idempotencyKey, attempt) });
}

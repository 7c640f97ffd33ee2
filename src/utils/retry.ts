import { AbortError } from '../error/abortError.js';
import { MaxRetriesExceededError } from '../error/maxRetriesExceededError.js';
import { sleep } from './sleep.js';
import { isOk, type SafeWrap, type SafeWrapAsync } from './wrap.js';

/**
 * State of one logical call:
 * - `attempting`: attempt `attempt` (0-based) is about to run
 * - `success`: an attempt returned a value
 * - `failed`: a terminal error, or retries ran out
 */
export type RetryState<R, E extends Error> =
  | { status: 'attempting'; attempt: number; lastError?: E }
  | { status: 'success'; value: R }
  | { status: 'failed'; error: E | MaxRetriesExceededError };

/** Decides what happens after an attempt. */
export interface RetryPolicy<E extends Error> {
  /** Retries allowed after the first attempt; total attempts are `maxRetries + 1`. */
  maxRetries: number;
  /** Whether another attempt may succeed where this error happened. */
  isRetryable: (error: E) => boolean;
}

/** Whole, non-negative retry count; anything else (`NaN`, negative) allows none. */
function retryLimit(maxRetries: number): number {
  return maxRetries >= 0 ? Math.floor(maxRetries) : 0;
}

/**
 * Pure transition of the retry machine after attempt `attempt` produced `outcome`.
 */
export function transition<R, E extends Error>(
  attempt: number,
  outcome: SafeWrap<E, R>,
  { maxRetries, isRetryable }: RetryPolicy<E>,
): RetryState<R, E> {
  if (isOk(outcome)) {
    return { status: 'success', value: outcome[1] };
  }

  const [error] = outcome;
  if (!isRetryable(error)) {
    return { status: 'failed', error };
  }

  const next = attempt + 1;
  if (next > retryLimit(maxRetries)) {
    return {
      status: 'failed',
      error: new MaxRetriesExceededError(`error retries exhausted after ${next} attempts`, next, { cause: error }),
    };
  }

  return { status: 'attempting', attempt: next, lastError: error };
}

/** Options for retry-function */
export interface RetryOptions<R, E extends Error> extends Partial<Pick<RetryPolicy<E>, 'maxRetries'>> {
  /** Function to execute; must return a tuple-style result. Receives the 0-based attempt. */
  fn: (attempt: number) => SafeWrapAsync<E, R>;
  /** Decides which errors are worth another attempt. */
  isRetryable: RetryPolicy<E>['isRetryable'];
  /** Milliseconds to wait between attempts. */
  delay?: number;
  /** Cancels the call; no attempt starts once it has aborted. */
  signal?: AbortSignal;
  /** Invoked before waiting for the next attempt. */
  onRetry?: (error: E, nextAttempt: number) => void;
}

/**
 * Runs `fn` until it succeeds, fails with a non-retryable error, or the retries run out.
 * Attempts are strictly sequential with `delay` ms between them.
 *
 * `This is for functions that catch their own errors and return them in a tuple structure like [Error, Response]`
 *
 * @example
 * const [err, charge] = await retry({ fn: () => createCharge(), isRetryable: isRetryableError });
 */
export async function retry<R, E extends Error>({
  fn,
  isRetryable,
  maxRetries = 2,
  delay = 1000,
  signal,
  onRetry,
}: RetryOptions<R, E>): SafeWrapAsync<E | AbortError | MaxRetriesExceededError, R> {
  let state: RetryState<R, E> = { status: 'attempting', attempt: 0 };

  while (state.status === 'attempting') {
    if (signal?.aborted) {
      const message = `error call cancelled before attempt ${state.attempt + 1}`;
      return [new AbortError(message, { cause: signal.reason }), null];
    }

    state = transition(state.attempt, await fn(state.attempt), { maxRetries, isRetryable });

    if (state.status === 'attempting' && state.lastError) {
      onRetry?.(state.lastError, state.attempt);
      await sleep(delay, signal);
    }
  }

  if (state.status === 'success') {
    return [null, state.value];
  }

  return [state.error, null];
}

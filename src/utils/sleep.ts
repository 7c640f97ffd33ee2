/**
 * Waits for the given number of milliseconds, or until `signal` aborts.
 *
 * Useful for delaying execution in async code (e.g. retries, backoff, throttling).
 * Resolves either way; the caller checks `signal.aborted` afterwards.
 *
 * @example
 * await sleep(250);
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

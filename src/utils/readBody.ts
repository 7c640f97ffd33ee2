import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * Reads a response body as text.
 *
 * 204 and 205 carry no body and read as `''`. The body stream is consumed,
 * so callers decode the returned text instead of reading the response again.
 */
export async function readBody(response: Response): SafeWrapAsync<Error, string> {
  if (response.status === 204 || response.status === 205) {
    return [null, ''];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body', { cause: errText }), null];
  }

  return [null, text];
}

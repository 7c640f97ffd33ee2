import type { FormFields } from '../codec/form.js';

/**
 * Builds a relative URL from a path and already encoded query fields.
 * A leading slash is stripped for concatenation with the base url.
 */
export function constructUrl(path: string, query?: FormFields): string {
  const result = path.startsWith('/') ? path.substring(1) : path;
  const search = new URLSearchParams(query).toString();
  if (!search) {
    return result;
  }

  return `${result}?${search}`;
}

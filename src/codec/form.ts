import { toSnakeCase } from './case.js';
import { toUnixSeconds } from './timestamp.js';

/** Scalar written as a single form field. */
export type FormScalar = string | number | boolean | Date;

/** Anything {@link encodeForm} knows how to flatten. */
export type FormValue = FormScalar | null | undefined | FormValue[] | { readonly [key: string]: FormValue };

/** Top-level input of {@link encodeForm}. */
export type FormInput = { readonly [key: string]: FormValue };

/** Flattened form fields, ready to be url-encoded. */
export type FormFields = Record<string, string>;

/** Options for {@link encodeForm}. */
export interface EncodeFormOptions {
  /**
   * Keys whose children are user data and keep their names as given.
   * @default ['metadata']
   */
  verbatimKeys?: readonly string[];
}

const DEFAULT_VERBATIM_KEYS = ['metadata'];

/**
 * Flattens a nested value into form fields using bracket notation.
 *
 * - keys are converted to snake_case, except below a verbatim key such as `metadata`
 * - nested objects become `parent[child]`, arrays become `parent[0]`
 * - `null` and `undefined` are omitted, never written as empty strings
 * - dates are written as integer seconds since the epoch
 *
 * @example
 * encodeForm({ legalEntity: { address: { city: 'Oslo' } } });
 * // { 'legal_entity[address][city]': 'Oslo' }
 */
export function encodeForm(input: FormInput, opts: EncodeFormOptions = {}): FormFields {
  const verbatimKeys = opts.verbatimKeys ?? DEFAULT_VERBATIM_KEYS;
  const fields: FormFields = {};

  for (const [key, value] of Object.entries(input)) {
    flatten(fields, toSnakeCase(key), value, verbatimKeys.includes(key), verbatimKeys);
  }

  return fields;
}

function flatten(
  fields: FormFields,
  name: string,
  value: FormValue,
  verbatim: boolean,
  verbatimKeys: readonly string[],
): void {
  if (value === null || value === undefined) {
    return;
  }

  if (value instanceof Date) {
    fields[name] = String(toUnixSeconds(value));
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => flatten(fields, `${name}[${index}]`, item, verbatim, verbatimKeys));
    return;
  }

  if (typeof value === 'object') {
    for (const [key, child] of Object.entries(value)) {
      const childName = verbatim ? key : toSnakeCase(key);
      flatten(fields, `${name}[${childName}]`, child, verbatim || verbatimKeys.includes(key), verbatimKeys);
    }
    return;
  }

  fields[name] = String(value);
}

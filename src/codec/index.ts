/**
 * Codec entrypoint: form encoding, schema decoding and the shared wire helpers.
 * @module
 */

export { toCamelCase, toSnakeCase } from './case.js';
export { decode } from './decode.js';
export { type Expandable, expandable, expandableId } from './expandable.js';
export {
  type EncodeFormOptions,
  encodeForm,
  type FormFields,
  type FormInput,
  type FormScalar,
  type FormValue,
} from './form.js';
export { timestampSchema, toUnixSeconds } from './timestamp.js';

import type { StandardSchemaV1 } from '@standard-schema/spec';
import { UnknownVariantError } from '../error/unknownVariantError.js';
import type { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Issue raised by a discriminated union that found no decoder for the discriminator value. */
type DiscriminatorIssue = StandardSchemaV1.Issue & {
  code: 'invalid_union_discriminator';
  options: unknown[];
};

function isDiscriminatorIssue(issue: StandardSchemaV1.Issue): issue is DiscriminatorIssue {
  return (
    'code' in issue &&
    issue.code === 'invalid_union_discriminator' &&
    'options' in issue &&
    Array.isArray(issue.options)
  );
}

function pathKey(segment: PropertyKey | StandardSchemaV1.PathSegment): PropertyKey {
  return typeof segment === 'object' ? segment.key : segment;
}

/** Reads the value found at `path` inside `input`, or `undefined` when the path does not resolve. */
function valueAt(input: unknown, path: readonly PropertyKey[]): unknown {
  let current = input;
  for (const key of path) {
    if (typeof current !== 'object' || current === null || typeof key === 'symbol') {
      return undefined;
    }

    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }

  return current;
}

/**
 * Decodes a parsed JSON value with the given schema.
 *
 * A failure is returned as a {@link ValidationError} carrying every issue. When one of the
 * issues comes from a discriminated union that does not know the discriminator value, an
 * {@link UnknownVariantError} is returned instead, naming the key, the value and the known variants.
 *
 * @example
 * const [err, customer] = await decode(customerSchema, JSON.parse(body));
 */
export async function decode<T extends StandardSchemaV1>(
  schema: T,
  json: unknown,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, value] = await validator(json, schema);
  if (!err) {
    return [null, value];
  }

  const issue = err.issues.find(isDiscriminatorIssue);
  if (!issue) {
    return [err, null];
  }

  const path = (issue.path ?? []).map(pathKey);

  return [
    new UnknownVariantError(
      {
        discriminator: String(path.at(-1) ?? ''),
        value: valueAt(json, path),
        known: issue.options.map(String),
        path,
      },
      err.issues,
      { cause: err },
    ),
    null,
  ];
}

import { z } from 'zod';

/**
 * A field the API returns either as an id (`"cus_123"`) or as the full object,
 * depending on whether it was expanded.
 */
export type Expandable<T> =
  | { readonly kind: 'reference'; readonly id: string }
  | { readonly kind: 'full'; readonly value: T };

/**
 * Builds a schema that dispatches on the JSON shape: a string decodes to a reference,
 * an object is decoded by `schema` into the full variant. Issues of `schema`, including
 * unknown discriminators, surface at the field's path.
 */
export function expandable<S extends z.ZodTypeAny>(schema: S) {
  return z.unknown().transform((input, ctx): Expandable<z.output<S>> => {
    if (typeof input === 'string') {
      return { kind: 'reference', id: input };
    }

    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an id or an object' });
      return z.NEVER;
    }

    const result = schema.safeParse(input);
    if (result.success) {
      return { kind: 'full', value: result.data };
    }

    for (const issue of result.error.issues) {
      ctx.addIssue(issue);
    }

    return z.NEVER;
  });
}

/** Id of an expandable field, whichever variant was returned. */
export function expandableId<T extends { id: string }>(field: Expandable<T>): string {
  return field.kind === 'reference' ? field.id : field.value.id;
}

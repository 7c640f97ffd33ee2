import { z } from 'zod';
import type { FormValue } from '../codec/form.js';
import { timestampSchema } from '../codec/timestamp.js';

/**
 * Filter on a timestamp field of a list call: either an exact timestamp or a range.
 */
export type ListFilterInput =
  | { readonly kind: 'timestamp'; readonly timestamp: Date }
  | {
      readonly kind: 'range';
      readonly gt?: Date;
      readonly gte?: Date;
      readonly lt?: Date;
      readonly lte?: Date;
    };

const rangeSchema = z
  .object({
    gt: timestampSchema.optional(),
    gte: timestampSchema.optional(),
    lt: timestampSchema.optional(),
    lte: timestampSchema.optional(),
  })
  .strict();

/**
 * Decodes a filter by JSON shape: an integer is an exact timestamp, an object is a range.
 */
export const listFilterInputSchema = z.unknown().transform((input, ctx): ListFilterInput => {
  if (typeof input === 'number') {
    const timestamp = timestampSchema.safeParse(input);
    if (timestamp.success) {
      return { kind: 'timestamp', timestamp: timestamp.data };
    }

    for (const issue of timestamp.error.issues) {
      ctx.addIssue(issue);
    }
    return z.NEVER;
  }

  if (typeof input === 'object' && input !== null && !Array.isArray(input)) {
    const range = rangeSchema.safeParse(input);
    if (range.success) {
      return { kind: 'range', ...range.data };
    }

    for (const issue of range.error.issues) {
      ctx.addIssue(issue);
    }
    return z.NEVER;
  }

  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a timestamp or a range object' });
  return z.NEVER;
});

/**
 * Form value of a filter: `created=…` for a timestamp, `created[gt]=…` and friends for a range.
 */
export function listFilterToForm(filter: ListFilterInput): FormValue {
  if (filter.kind === 'timestamp') {
    return filter.timestamp;
  }

  return { gt: filter.gt, gte: filter.gte, lt: filter.lt, lte: filter.lte };
}

import { z } from 'zod';
import type { FormInput } from '../codec/form.js';
import { type ListFilterInput, listFilterToForm } from './listFilter.js';

/**
 * One page of a list endpoint. Immutable; fetching the next page is up to the caller.
 */
export interface ListEnvelope<T> {
  /** Url of the list endpoint, e.g. `/v1/charges` */
  readonly url: string;
  /** Whether more items exist after this page */
  readonly hasMore: boolean;
  readonly data: readonly T[];
  /** Total item count, present only when requested with `include[]=total_count` */
  readonly totalCount?: number;
}

/**
 * Builds the schema of a list envelope whose items decode with `item`.
 */
export function listOf<S extends z.ZodTypeAny>(item: S) {
  return z
    .object({
      object: z.literal('list').optional(),
      url: z.string(),
      has_more: z.boolean(),
      data: z.array(item),
      total_count: z.number().int().nonnegative().optional(),
    })
    .transform(
      (list): ListEnvelope<z.output<S>> =>
        Object.freeze({
          url: list.url,
          hasMore: list.has_more,
          data: Object.freeze(list.data),
          ...(list.total_count === undefined ? {} : { totalCount: list.total_count }),
        }),
    );
}

/** Cursor and filter parameters shared by list endpoints. */
export interface ListParams {
  /** Page size, 1 to 100 */
  limit?: number;
  /** Return items after this id */
  startingAfter?: string;
  /** Return items before this id */
  endingBefore?: string;
  /** Filter on creation time */
  created?: ListFilterInput;
  /** Ask for `totalCount` in the envelope */
  includeTotalCount?: boolean;
}

/**
 * Query fields for a list call, ready for `encodeForm`.
 */
export function listQuery({ limit, startingAfter, endingBefore, created, includeTotalCount }: ListParams): FormInput {
  return {
    limit,
    startingAfter,
    endingBefore,
    created: created && listFilterToForm(created),
    include: includeTotalCount ? ['total_count'] : undefined,
  };
}

/**
 * Cursor for the page after `page`, or `null` when this is the last one.
 */
export function nextPage<T extends { id: string }>(page: ListEnvelope<T>): Pick<ListParams, 'startingAfter'> | null {
  const last = page.data.at(-1);
  if (!page.hasMore || !last) {
    return null;
  }

  return { startingAfter: last.id };
}

import { z } from 'zod';

/** Wire timestamp: integer seconds since the Unix epoch, decoded into a `Date`. */
export const timestampSchema = z
  .number()
  .int()
  .transform((seconds) => new Date(seconds * 1000));

/** Encodes a `Date` the way the API writes timestamps. */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

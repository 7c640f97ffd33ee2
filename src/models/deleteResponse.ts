import { z } from 'zod';

/** Body returned by every DELETE endpoint. */
export const deleteResponseSchema = z.object({
  id: z.string(),
  deleted: z.boolean(),
});

export type DeleteResponse = z.output<typeof deleteResponseSchema>;

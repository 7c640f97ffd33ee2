import { z } from 'zod';
import { timestampSchema } from '../codec/timestamp.js';
import { stripeObjectSchema } from './stripeObject.js';

export const eventSchema = z.object({
  id: z.string(),
  object: z.literal('event'),
  type: z.string(),
  created: timestampSchema,
  livemode: z.boolean(),
  pending_webhooks: z.number().int().optional(),
  data: z.object({
    object: stripeObjectSchema,
    previous_attributes: z.record(z.unknown()).optional(),
  }),
});

export type StripeEvent = z.output<typeof eventSchema>;

import { z } from 'zod';
import { timestampSchema } from '../codec/timestamp.js';
import { metadataSchema } from './metadata.js';

export const transferSchema = z.object({
  id: z.string(),
  object: z.literal('transfer'),
  amount: z.number().int(),
  amount_reversed: z.number().int(),
  currency: z.string(),
  created: timestampSchema,
  livemode: z.boolean(),
  reversed: z.boolean(),
  destination: z.string().nullish(),
  description: z.string().nullish(),
  source_transaction: z.string().nullish(),
  source_type: z.enum(['card', 'bank_account', 'bitcoin_receiver', 'alipay_account']).nullish(),
  statement_descriptor: z.string().nullish(),
  metadata: metadataSchema.optional(),
});

export type Transfer = z.output<typeof transferSchema>;

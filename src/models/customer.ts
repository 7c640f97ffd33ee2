import { z } from 'zod';
import { expandable } from '../codec/expandable.js';
import { timestampSchema } from '../codec/timestamp.js';
import { listOf } from './list.js';
import { metadataSchema } from './metadata.js';
import { paymentSourceSchema } from './paymentSource.js';

const addressSchema = z.object({
  line1: z.string().nullish(),
  line2: z.string().nullish(),
  city: z.string().nullish(),
  state: z.string().nullish(),
  postal_code: z.string().nullish(),
  country: z.string().nullish(),
});

export const customerSchema = z.object({
  id: z.string(),
  object: z.literal('customer'),
  created: timestampSchema,
  livemode: z.boolean(),
  email: z.string().nullish(),
  description: z.string().nullish(),
  delinquent: z.boolean().nullish(),
  currency: z.string().nullish(),
  /** Id of the default source, or the source itself when expanded */
  default_source: expandable(paymentSourceSchema).nullish(),
  shipping: z
    .object({
      name: z.string(),
      phone: z.string().nullish(),
      address: addressSchema,
    })
    .nullish(),
  sources: listOf(paymentSourceSchema).optional(),
  metadata: metadataSchema.optional(),
});

export type Customer = z.output<typeof customerSchema>;

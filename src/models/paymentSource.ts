import { z } from 'zod';
import { timestampSchema } from '../codec/timestamp.js';
import { metadataSchema } from './metadata.js';

export const cardSchema = z.object({
  id: z.string(),
  object: z.literal('card'),
  brand: z.string(),
  last4: z.string(),
  exp_month: z.number().int(),
  exp_year: z.number().int(),
  funding: z.enum(['credit', 'debit', 'prepaid', 'unknown']),
  country: z.string().nullish(),
  customer: z.string().nullish(),
  name: z.string().nullish(),
  cvc_check: z.enum(['pass', 'fail', 'unavailable', 'unchecked']).nullish(),
  address_zip: z.string().nullish(),
  fingerprint: z.string().nullish(),
  metadata: metadataSchema.optional(),
});

export type Card = z.output<typeof cardSchema>;

export const bitcoinReceiverSchema = z.object({
  id: z.string(),
  object: z.literal('bitcoin_receiver'),
  active: z.boolean(),
  amount: z.number().int(),
  amount_received: z.number().int(),
  bitcoin_amount: z.number().int(),
  bitcoin_amount_received: z.number().int(),
  bitcoin_uri: z.string(),
  created: timestampSchema,
  currency: z.string(),
  filled: z.boolean(),
  inbound_address: z.string(),
  uncaptured_funds: z.boolean(),
  livemode: z.boolean(),
  email: z.string().nullish(),
  description: z.string().nullish(),
  customer: z.string().nullish(),
  metadata: metadataSchema.optional(),
});

export type BitcoinReceiver = z.output<typeof bitcoinReceiverSchema>;

/** Card or bitcoin receiver, chosen by the `object` field. */
export const paymentSourceSchema = z.discriminatedUnion('object', [cardSchema, bitcoinReceiverSchema]);

export type PaymentSource = z.output<typeof paymentSourceSchema>;

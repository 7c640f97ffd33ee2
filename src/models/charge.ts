import { z } from 'zod';
import { expandable } from '../codec/expandable.js';
import { timestampSchema } from '../codec/timestamp.js';
import { customerSchema } from './customer.js';
import { metadataSchema } from './metadata.js';
import { paymentSourceSchema } from './paymentSource.js';

export const chargeSchema = z.object({
  id: z.string(),
  object: z.literal('charge'),
  amount: z.number().int(),
  amount_refunded: z.number().int(),
  currency: z.string(),
  created: timestampSchema,
  livemode: z.boolean(),
  paid: z.boolean(),
  captured: z.boolean(),
  refunded: z.boolean(),
  status: z.enum(['succeeded', 'pending', 'failed']),
  customer: expandable(customerSchema).nullish(),
  source: paymentSourceSchema.nullish(),
  description: z.string().nullish(),
  receipt_email: z.string().nullish(),
  statement_descriptor: z.string().nullish(),
  failure_code: z.string().nullish(),
  failure_message: z.string().nullish(),
  metadata: metadataSchema.optional(),
});

export type Charge = z.output<typeof chargeSchema>;

/** Card details sent inline with a charge instead of a token. */
export type CardDetails = {
  number: string;
  expMonth: number;
  expYear: number;
  cvc?: string;
  name?: string;
  addressLine1?: string;
  addressZip?: string;
  addressCountry?: string;
};

/** Wire shape of inline card details, decoded into {@link CardDetails}. */
export const cardDetailsSchema = z
  .object({
    number: z.string(),
    exp_month: z.number().int().min(1).max(12),
    exp_year: z.number().int(),
    cvc: z.string().optional(),
    name: z.string().optional(),
    address_line1: z.string().optional(),
    address_zip: z.string().optional(),
    address_country: z.string().optional(),
  })
  .transform(
    (card): CardDetails => ({
      number: card.number,
      expMonth: card.exp_month,
      expYear: card.exp_year,
      cvc: card.cvc,
      name: card.name,
      addressLine1: card.address_line1,
      addressZip: card.address_zip,
      addressCountry: card.address_country,
    }),
  );

/**
 * What a charge is paid with: a token or card id, or the card details themselves.
 * `"tok_visa"` decodes to a reference, an object to full card details.
 */
export const chargeSourceSchema = expandable(cardDetailsSchema);

export type ChargeSource = z.output<typeof chargeSourceSchema>;

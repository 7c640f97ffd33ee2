import { z } from 'zod';
import { chargeSchema } from './charge.js';
import { customerSchema } from './customer.js';
import { bitcoinReceiverSchema, cardSchema } from './paymentSource.js';
import { transferSchema } from './transfer.js';

/**
 * Registry of every object type this client decodes, keyed by the `object` field.
 * An unregistered type fails with an unknown variant error.
 */
export const stripeObjectSchema = z.discriminatedUnion('object', [
  customerSchema,
  cardSchema,
  bitcoinReceiverSchema,
  chargeSchema,
  transferSchema,
]);

export type StripeObject = z.output<typeof stripeObjectSchema>;

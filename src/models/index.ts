/**
 * Wire models: zod schemas in the API's snake_case shape, plus list and filter helpers.
 * @module
 */

export {
  type CardDetails,
  type Charge,
  type ChargeSource,
  cardDetailsSchema,
  chargeSchema,
  chargeSourceSchema,
} from './charge.js';
export { type Customer, customerSchema } from './customer.js';
export { type DeleteResponse, deleteResponseSchema } from './deleteResponse.js';
export { eventSchema, type StripeEvent } from './event.js';
export { type ListEnvelope, type ListParams, listOf, listQuery, nextPage } from './list.js';
export { type ListFilterInput, listFilterInputSchema, listFilterToForm } from './listFilter.js';
export { metadataSchema } from './metadata.js';
export {
  type BitcoinReceiver,
  bitcoinReceiverSchema,
  type Card,
  cardSchema,
  type PaymentSource,
  paymentSourceSchema,
} from './paymentSource.js';
export { StatementDescriptor } from './statementDescriptor.js';
export { type StripeObject, stripeObjectSchema } from './stripeObject.js';
export { type Transfer, transferSchema } from './transfer.js';

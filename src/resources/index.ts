export { type ChargeCreateInput, type ChargeListParams, Charges, sourceToForm } from './charges.js';
export { type AddressInput, type CustomerCreateInput, Customers } from './customers.js';
export { type EventListParams, Events } from './events.js';
export { type TransferCreateInput, type TransferListParams, Transfers } from './transfers.js';

import type { StripeClient } from '../core/client.js';
import type { CallOptions, MutationOptions } from '../core/types.js';
import { customerSchema } from '../models/customer.js';
import { type ListParams, listOf, listQuery } from '../models/list.js';

export type AddressInput = {
  line1: string;
  line2?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
};

/** Fields of a new customer. */
export type CustomerCreateInput = {
  email?: string;
  description?: string;
  /** Token to attach as the default source */
  source?: string;
  shipping?: {
    name: string;
    phone?: string;
    address: AddressInput;
  };
  metadata?: Record<string, string>;
};

/** Customers: create, retrieve, delete and list. */
export class Customers {
  #client: StripeClient;

  constructor(client: StripeClient) {
    this.#client = client;
  }

  create(input: CustomerCreateInput, opts?: MutationOptions) {
    return this.#client.post('/v1/customers', input, customerSchema, opts);
  }

  retrieve(id: string, opts?: CallOptions) {
    return this.#client.get(`/v1/customers/${encodeURIComponent(id)}`, customerSchema, opts);
  }

  delete(id: string, opts?: MutationOptions) {
    return this.#client.delete(`/v1/customers/${encodeURIComponent(id)}`, opts);
  }

  list(params: ListParams = {}, opts?: CallOptions) {
    return this.#client.get('/v1/customers', listOf(customerSchema), { ...opts, query: listQuery(params) });
  }
}

import type { StripeClient } from '../core/client.js';
import type { CallOptions, MutationOptions } from '../core/types.js';
import { type ListParams, listOf, listQuery } from '../models/list.js';
import type { StatementDescriptor } from '../models/statementDescriptor.js';
import { transferSchema } from '../models/transfer.js';

/** Fields of a new transfer. */
export type TransferCreateInput = {
  amount: number;
  currency: string;
  /** Connected account receiving the funds */
  destination: string;
  description?: string;
  /** Charge the transfer is funded from */
  sourceTransaction?: string;
  statementDescriptor?: StatementDescriptor;
  metadata?: Record<string, string>;
};

/** Filters of {@link Transfers.list}. */
export type TransferListParams = ListParams & {
  destination?: string;
};

/**
 * Transfers: create, retrieve and list. Pass `stripeAccount` in the call options
 * to act on behalf of a connected account.
 */
export class Transfers {
  #client: StripeClient;

  constructor(client: StripeClient) {
    this.#client = client;
  }

  create({ statementDescriptor, ...input }: TransferCreateInput, opts?: MutationOptions) {
    return this.#client.post(
      '/v1/transfers',
      { ...input, statementDescriptor: statementDescriptor?.value },
      transferSchema,
      opts,
    );
  }

  retrieve(id: string, opts?: CallOptions) {
    return this.#client.get(`/v1/transfers/${encodeURIComponent(id)}`, transferSchema, opts);
  }

  list({ destination, ...params }: TransferListParams = {}, opts?: CallOptions) {
    return this.#client.get('/v1/transfers', listOf(transferSchema), {
      ...opts,
      query: { ...listQuery(params), destination },
    });
  }
}

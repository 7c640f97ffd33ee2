import type { Expandable } from '../codec/expandable.js';
import type { FormInput, FormValue } from '../codec/form.js';
import type { StripeClient } from '../core/client.js';
import type { CallOptions, MutationOptions } from '../core/types.js';
import { type CardDetails, type ChargeSource, chargeSchema } from '../models/charge.js';
import { type ListParams, listOf, listQuery } from '../models/list.js';
import type { StatementDescriptor } from '../models/statementDescriptor.js';

/** Fields of a new charge. */
export type ChargeCreateInput = {
  /** Amount in the smallest currency unit */
  amount: number;
  currency: string;
  /** Token or card id, or the card details themselves */
  source?: ChargeSource;
  /** Customer to charge; their default source is used when `source` is omitted */
  customer?: string;
  description?: string;
  receiptEmail?: string;
  statementDescriptor?: StatementDescriptor;
  /** `false` only authorizes, see {@link Charges.capture} */
  capture?: boolean;
  metadata?: Record<string, string>;
};

/** Filters of {@link Charges.list}. */
export type ChargeListParams = ListParams & {
  /** Only charges of this customer */
  customer?: string;
};

/** `source=tok_…` for a reference, `source[object]=card&source[number]=…` for inline details. */
export function sourceToForm(source: Expandable<CardDetails>): FormValue {
  if (source.kind === 'reference') {
    return source.id;
  }

  return { object: 'card', ...source.value };
}

/** Charges: create, capture, retrieve and list. */
export class Charges {
  #client: StripeClient;

  constructor(client: StripeClient) {
    this.#client = client;
  }

  create({ source, statementDescriptor, ...input }: ChargeCreateInput, opts?: MutationOptions) {
    const form: FormInput = {
      ...input,
      source: source && sourceToForm(source),
      statementDescriptor: statementDescriptor?.value,
    };

    return this.#client.post('/v1/charges', form, chargeSchema, opts);
  }

  /** Captures an uncaptured charge, optionally for less than the authorized amount. */
  capture(id: string, { amount }: { amount?: number } = {}, opts?: MutationOptions) {
    return this.#client.post(`/v1/charges/${encodeURIComponent(id)}/capture`, { amount }, chargeSchema, opts);
  }

  retrieve(id: string, opts?: CallOptions) {
    return this.#client.get(`/v1/charges/${encodeURIComponent(id)}`, chargeSchema, opts);
  }

  list({ customer, ...params }: ChargeListParams = {}, opts?: CallOptions) {
    return this.#client.get('/v1/charges', listOf(chargeSchema), {
      ...opts,
      query: { ...listQuery(params), customer },
    });
  }
}

import type { StripeClient } from '../core/client.js';
import type { CallOptions } from '../core/types.js';
import { eventSchema } from '../models/event.js';
import { type ListParams, listOf, listQuery } from '../models/list.js';

/** Filters of {@link Events.list}. */
export type EventListParams = ListParams & {
  /** Event type such as `charge.succeeded`; `charge.*` matches a family */
  type?: string;
};

/** Events: retrieve and list. */
export class Events {
  #client: StripeClient;

  constructor(client: StripeClient) {
    this.#client = client;
  }

  retrieve(id: string, opts?: CallOptions) {
    return this.#client.get(`/v1/events/${encodeURIComponent(id)}`, eventSchema, opts);
  }

  list({ type, ...params }: EventListParams = {}, opts?: CallOptions) {
    return this.#client.get('/v1/events', listOf(eventSchema), { ...opts, query: { ...listQuery(params), type } });
  }
}

import { loadConfig } from './config.js';
import { StripeClient } from './core/client.js';
import type { StripeClientProps } from './core/types.js';
import type { ValidationError } from './error/validationError.js';
import { createLogger } from './logger.js';
import { Charges } from './resources/charges.js';
import { Customers } from './resources/customers.js';
import { Events } from './resources/events.js';
import { Transfers } from './resources/transfers.js';
import type { SafeWrap } from './utils/wrap.js';

/**
 * Entry point bundling one {@link StripeClient} with the resource modules.
 *
 * @example
 * const [err, stripe] = Stripe.fromEnv();
 * const [errCharge, charge] = await stripe.charges.retrieve('ch_123');
 */
export class Stripe {
  readonly client: StripeClient;
  readonly charges: Charges;
  readonly customers: Customers;
  readonly transfers: Transfers;
  readonly events: Events;

  constructor(props: StripeClientProps) {
    this.client = new StripeClient(props);
    this.charges = new Charges(this.client);
    this.customers = new Customers(this.client);
    this.transfers = new Transfers(this.client);
    this.events = new Events(this.client);
  }

  /** Builds a client from `STRIPE_*` and `LOG_LEVEL` environment variables, see {@link loadConfig}. */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): SafeWrap<ValidationError, Stripe> {
    const [err, config] = loadConfig(env);
    if (err) {
      return [err, null];
    }

    const { logLevel, ...props } = config;
    return [null, new Stripe({ ...props, logger: createLogger({ level: logLevel }) })];
  }

  /** Cancels in-flight calls and releases the transport. */
  dispose() {
    this.client.dispose();
  }
}

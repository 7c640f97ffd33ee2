/**
 * Root entrypoint: re-exports the client, resources, models, codec and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client bundling a {@link StripeClient} with the resource modules.
 */
export { Stripe } from './stripe.js';

export * from './codec/index.js';
export * from './core/index.js';
export * from './error/index.js';
export * from './models/index.js';
export * from './resources/index.js';

/** Client settings read from `STRIPE_*` environment variables. */
export { type ClientConfig, loadConfig } from './config.js';

/** Pino logger with card data and credentials redacted. */
export { type CreateLoggerOptions, createLogger, type Logger, REDACTED_PATHS, redactCardFields } from './logger.js';

/** Pluggable transport. */
export * from './fetch/index.js';
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  HttpMethod,
} from './types/request.js';

/** Tuple-based result used throughout the client, `[error, data]`. */
export { isOk, type SafeWrap, type SafeWrapAsync } from './utils/wrap.js';

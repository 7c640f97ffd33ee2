import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import { ApiKey, Endpoint } from './core/credentials.js';
import { ValidationError } from './error/validationError.js';
import type { SafeWrap } from './utils/wrap.js';

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const satisfies readonly LevelWithSilent[];

const envSchema = z.object({
  STRIPE_API_KEY: z.string().min(1),
  STRIPE_ENDPOINT: z.string().url().default(Endpoint.DEFAULT),
  STRIPE_NUMBER_OF_RETRIES: z.coerce.number().int().nonnegative().default(2),
  STRIPE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  STRIPE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(60_000),
  STRIPE_API_VERSION: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/** Client settings read from the environment. */
export interface ClientConfig {
  apiKey: ApiKey;
  endpoint: Endpoint;
  maxRetries: number;
  /** Milliseconds between attempts */
  retryDelay: number;
  /** Per-attempt timeout in milliseconds, `false` when disabled */
  timeout: number | false;
  apiVersion?: string;
  logLevel: LevelWithSilent;
}

/**
 * Reads the client configuration from environment variables.
 *
 * `STRIPE_API_KEY` is required; everything else has a default.
 * `STRIPE_TIMEOUT_MS=0` disables the per-attempt timeout.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SafeWrap<ValidationError, ClientConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return [new ValidationError('error loading configuration', parsed.error.issues), null];
  }

  const { data } = parsed;
  return [
    null,
    {
      apiKey: new ApiKey(data.STRIPE_API_KEY),
      endpoint: new Endpoint(data.STRIPE_ENDPOINT),
      maxRetries: data.STRIPE_NUMBER_OF_RETRIES,
      retryDelay: data.STRIPE_RETRY_DELAY_MS,
      timeout: data.STRIPE_TIMEOUT_MS === 0 ? false : data.STRIPE_TIMEOUT_MS,
      ...(data.STRIPE_API_VERSION ? { apiVersion: data.STRIPE_API_VERSION } : {}),
      logLevel: data.LOG_LEVEL,
    },
  ];
}

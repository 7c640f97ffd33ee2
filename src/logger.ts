import { type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions, pino } from 'pino';

export type { Logger };

/** Options for {@link createLogger}. */
export interface CreateLoggerOptions {
  /** Minimum level; defaults to `LOG_LEVEL` or `info` */
  level?: LevelWithSilent;
  /** Where records are written; defaults to stdout */
  destination?: DestinationStream;
}

const CENSOR = '[REDACTED]';

/** Fields that must never reach a log record. */
export const REDACTED_PATHS = ['headers.authorization', 'headers.Authorization', 'apiKey'];

/** Flattened form keys holding card data, e.g. `source[number]` or `card[cvc]`. */
const CARD_FIELD = /\[(number|cvc)\]$/;

/**
 * Censors card number and cvc fields of a flattened form.
 * Bracketed keys cannot be expressed as redact paths, so `params` goes through this serializer.
 */
export function redactCardFields(params: unknown): unknown {
  if (typeof params !== 'object' || params === null) {
    return params;
  }

  return Object.fromEntries(
    Object.entries(params).map(([key, value]) => [key, CARD_FIELD.test(key) ? CENSOR : value]),
  );
}

/**
 * Creates the pino logger used by the client. Request and response records are
 * written at `debug`; card numbers and credentials are censored.
 */
export function createLogger({ level, destination }: CreateLoggerOptions = {}): Logger {
  const options: LoggerOptions = {
    name: 'stripe-wire',
    level: level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: REDACTED_PATHS,
      censor: CENSOR,
    },
    serializers: {
      params: redactCardFields,
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

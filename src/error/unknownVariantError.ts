import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { ValidationError } from './validationError.js';

/** Where and what the unrecognised discriminator was. */
export interface UnknownVariant {
  /** Discriminator key, e.g. `object` */
  discriminator: string;
  /** Value found under the discriminator key */
  value: unknown;
  /** Values the registry knows how to decode */
  known: readonly string[];
  /** Path of the discriminator inside the decoded document */
  path: readonly PropertyKey[];
}

/**
 * Decode failure for a union whose discriminator value is not registered.
 * Decoding never falls back to a default variant.
 */
export class UnknownVariantError extends ValidationError {
  /** UnknownVariantError error-name */
  static name = 'UnknownVariantError';
  name = 'UnknownVariantError';
  #variant: UnknownVariant;

  constructor(variant: UnknownVariant, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(
      `error unknown variant ${JSON.stringify(variant.value)} for "${variant.discriminator}", expected one of ${variant.known.join(', ')}`,
      issues,
      opts,
    );
    this.#variant = variant;
  }

  get discriminator(): string {
    return this.#variant.discriminator;
  }

  get value(): unknown {
    return this.#variant.value;
  }

  get known(): readonly string[] {
    return this.#variant.known;
  }

  get path(): readonly PropertyKey[] {
    return this.#variant.path;
  }
}

/**
 * Type guard for {@link UnknownVariantError}.
 */
export function isUnknownVariantError(error: unknown): error is UnknownVariantError {
  return isErrorType(UnknownVariantError, error);
}

/**
 * Extract an {@link UnknownVariantError} from an unknown error value, following nested causes.
 */
export function getUnknownVariantError(error: unknown): null | UnknownVariantError {
  return unwrapErrorType(UnknownVariantError, error);
}

import { isErrorType } from './isErrorType.js';

/**
 * Statement descriptor longer than the 22 characters card networks accept.
 */
export class StatementDescriptorTooLongError extends Error {
  /** StatementDescriptorTooLongError error-name */
  static name = 'StatementDescriptorTooLongError';
  name = 'StatementDescriptorTooLongError';
  #length: number;

  constructor(length: number, maxLength: number, opts?: ErrorOptions) {
    super(`error statement descriptor is ${length} characters, at most ${maxLength} allowed`, opts);
    this.#length = length;
  }

  get length(): number {
    return this.#length;
  }
}

/**
 * Statement descriptor containing one of `<`, `>`, `"` or `'`.
 */
export class StatementDescriptorInvalidCharacterError extends Error {
  /** StatementDescriptorInvalidCharacterError error-name */
  static name = 'StatementDescriptorInvalidCharacterError';
  name = 'StatementDescriptorInvalidCharacterError';
  #character: string;

  constructor(character: string, opts?: ErrorOptions) {
    super(`error statement descriptor contains forbidden character ${character}`, opts);
    this.#character = character;
  }

  get character(): string {
    return this.#character;
  }
}

/** Either way a statement descriptor can be rejected. */
export type StatementDescriptorError = StatementDescriptorTooLongError | StatementDescriptorInvalidCharacterError;

/**
 * Type guard for {@link StatementDescriptorError}.
 */
export function isStatementDescriptorError(error: unknown): error is StatementDescriptorError {
  return (
    isErrorType(StatementDescriptorTooLongError, error) || isErrorType(StatementDescriptorInvalidCharacterError, error)
  );
}

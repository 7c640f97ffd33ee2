import {
  type StatementDescriptorError,
  StatementDescriptorInvalidCharacterError,
  StatementDescriptorTooLongError,
} from '../error/statementDescriptorError.js';
import type { SafeWrap } from '../utils/wrap.js';

const MAX_LENGTH = 22;
const FORBIDDEN_CHARACTERS = ['<', '>', '"', "'"];

/**
 * Text shown on the customer's card statement. Only obtainable through
 * {@link StatementDescriptor.parse}, so every instance is valid.
 */
export class StatementDescriptor {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Validates `value`: at most 22 characters and none of `<`, `>`, `"` or `'`.
   *
   * @example
   * const [err, descriptor] = StatementDescriptor.parse('ACME PAYOUT');
   */
  static parse(value: string): SafeWrap<StatementDescriptorError, StatementDescriptor> {
    if (value.length > MAX_LENGTH) {
      return [new StatementDescriptorTooLongError(value.length, MAX_LENGTH), null];
    }

    const forbidden = FORBIDDEN_CHARACTERS.find((char) => value.includes(char));
    if (forbidden) {
      return [new StatementDescriptorInvalidCharacterError(forbidden), null];
    }

    return [null, new StatementDescriptor(value)];
  }

  toString(): string {
    return this.value;
  }
}

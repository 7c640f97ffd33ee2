import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';
import { UnknownVariantError } from './unknownVariantError.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { getValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('appends the issues to the message', () => {
    const err = new ValidationError('error validating data', [{ message: 'Required', path: ['id'] }]);

    expect(err.message).toBe('error validating data; issues: [{"message":"Required","path":["id"]}]');
    expect(err.issues).toHaveLength(1);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(ValidationError, new ValidationError('error-validating', []))).toEqual(true);
  });

  it('expect non ValidationError to return false', () => {
    expect(isErrorType(ValidationError, new Error('error'))).toEqual(false);
  });

  it('unwraps a ValidationError from a cause', () => {
    const validationErr = new ValidationError('error-validating', []);
    const err = new Error('error', { cause: validationErr });

    expect(unwrapErrorType(ValidationError, err)).toStrictEqual(validationErr);
  });
});

describe('UnknownVariantError', () => {
  it('is a ValidationError describing the unknown discriminator value', () => {
    const err = new UnknownVariantError(
      { discriminator: 'object', value: 'alipay_account', known: ['card', 'bitcoin_receiver'], path: ['object'] },
      [],
    );

    expect(getValidationError(err)).toBe(err);
    expect(err.discriminator).toBe('object');
    expect(err.value).toBe('alipay_account');
    expect(err.known).toEqual(['card', 'bitcoin_receiver']);
    expect(err.message).toBe(
      'error unknown variant "alipay_account" for "object", expected one of card, bitcoin_receiver; issues: []',
    );
  });
});

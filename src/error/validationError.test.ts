import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('appends the issues to the message', () => {
    const err = new ValidationError('error validating data', [{ message: 'Required', path: ['user'] }]);
    expect(err.message).toBe('error validating data; issues: [{"message":"Required","path":["user"]}]');
    expect(err.issues).toEqual([{ message: 'Required', path: ['user'] }]);
  });

  it('expect shallow to correctly return true', () => {
    expect(isValidationError(new ValidationError('error-validating', []))).toEqual(true);
  });

  it('expect non ValidationError to return false', () => {
    expect(isErrorType(ValidationError, new Error('error'))).toEqual(false);
  });

  it('unwraps a wrapped ValidationError', () => {
    const validationErr = new ValidationError('error-validating', []);
    const err = new Error('error', { cause: validationErr });
    expect(getValidationError(err)).toStrictEqual(validationErr);
  });
});

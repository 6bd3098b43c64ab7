import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';

class CustomError extends Error {}
class CustomOtherError extends Error {}
class DifferentError extends Error {}

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(CustomError, { foo: 'bar' })).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(CustomError, new CustomError('test'))).toEqual(true);
  });

  it('expect two layers deep to correctly return true', () => {
    const wrapped = new Error('err1', { cause: new CustomError('test') });
    expect(isErrorType(CustomError, wrapped)).toEqual(true);
  });

  it('expect 4 layers deep to correctly return true', () => {
    const err = new CustomError('test', { cause: new Error('first') });
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new CustomOtherError('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });
    expect(isErrorType(CustomError, wrapped3)).toEqual(true);
  });

  it('expect deep error with shallow check to correctly return false', () => {
    const wrapped = new Error('err1', { cause: new CustomError('test') });
    expect(isErrorType(CustomError, wrapped, true)).toEqual(false);
  });

  it('expect false on wrapped different error', () => {
    const err = new DifferentError('err');
    const wrapped = new Error('err1', { cause: err });
    expect(isErrorType(CustomError, new DifferentError('err2', { cause: wrapped }))).toEqual(false);
  });

  it('expect false when a cause is not an error', () => {
    const wrapped = new Error('err1', { cause: 'CustomError' });
    expect(isErrorType(CustomError, wrapped)).toEqual(false);
  });
});

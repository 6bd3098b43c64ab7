import { describe, expect, it } from 'vitest';
import { unwrapErrorType } from './unwrapErrorType.js';

class CustomError extends Error {}
class DifferentError extends Error {}
class KeyedError extends Error {
  constructor(
    message: string,
    readonly key: string,
    options?: ErrorOptions,
  ) {
    super(`${key} - ${message}`, options);
  }
}

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(CustomError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(CustomError, undefined)).toBeNull();
  });

  it('unwrap simplest layer', () => {
    const err = new KeyedError('non-recoverable-test', 'this-key');
    expect(unwrapErrorType(KeyedError, err)).toBe(err);
  });

  it('unwrap one wrapped layer', () => {
    const err = new KeyedError('non-recoverable-test', 'this-key');
    const unwrapped = unwrapErrorType(KeyedError, new Error('not-same-error', { cause: err }));
    expect(unwrapped?.key).toBe('this-key');
    expect(unwrapped?.message).toBe('this-key - non-recoverable-test');
  });

  it('unwrap 5 layers', () => {
    const err = new KeyedError('non-recoverable-test', 'this-key');
    let wrapped: Error = err;
    for (let layer = 1; layer <= 5; layer += 1) {
      wrapped = new Error(`err${layer}`, { cause: wrapped });
    }

    expect(unwrapErrorType(KeyedError, wrapped)).toBe(err);
  });

  it('returns the outermost match', () => {
    const inner = new CustomError('inner');
    const outer = new CustomError('outer', { cause: inner });
    expect(unwrapErrorType(CustomError, outer)).toBe(outer);
  });

  it('expect null on wrapped different error', () => {
    const err = new DifferentError('err2', { cause: new Error('err') });
    expect(unwrapErrorType(CustomError, err)).toBeNull();
  });

  it('loses the type once re-wrapped by message only', () => {
    const err = new KeyedError('message', 'key');
    expect(unwrapErrorType(KeyedError, new Error(err.message))).toBeNull();
  });
});

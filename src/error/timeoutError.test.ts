import { describe, expect, it } from 'vitest';
import { isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('exposes the elapsed timeout', () => {
    const err = new TimeoutError('timed out', 250);
    expect(err.timeout).toBe(250);
    expect(err.message).toBe('timed out');
  });
});

describe('isTimeoutError', () => {
  it('returns true for instances of TimeoutError', () => {
    expect(isTimeoutError(new TimeoutError('timed out', 10))).toBe(true);
  });

  it('returns true when wrapped as a cause', () => {
    const wrapped = new Error('outer', { cause: new TimeoutError('timed out', 10) });
    expect(isTimeoutError(wrapped)).toBe(true);
  });

  it('returns false for non TimeoutError errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });
});

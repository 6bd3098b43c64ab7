import { describe, expect, it } from 'vitest';
import { TimeoutError } from './timeoutError.js';
import { getTransportError, isTransportError, TransportError } from './transportError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

describe('TransportError', () => {
  it('keeps the transport failure as cause', () => {
    const timeout = new TimeoutError('timed out', 100);
    const err = new TransportError('error sending request', { cause: timeout });

    expect(isTransportError(err)).toBe(true);
    expect(unwrapErrorType(TimeoutError, err)).toBe(timeout);
  });

  it('returns null when no TransportError exists', () => {
    expect(getTransportError(new Error('boom'))).toBeNull();
  });
});

import { describe, expect, it } from 'vitest';
import { isRequestError, RequestError } from './requestError.js';

describe('RequestError', () => {
  it('exposes the method and url it was built with', () => {
    const err = new RequestError('bad method', 'GE T', 'https://example.com/checks');
    expect(err.method).toBe('GE T');
    expect(err.url).toBe('https://example.com/checks');
    expect(isRequestError(err)).toBe(true);
  });

  it('returns false for other errors', () => {
    expect(isRequestError(new TypeError('boom'))).toBe(false);
  });
});

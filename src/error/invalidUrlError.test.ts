import { describe, expect, it } from 'vitest';
import { getInvalidURLError, InvalidURLError, isInvalidURLError } from './invalidUrlError.js';

describe('InvalidURLError', () => {
  it('exposes url and stage via getters', () => {
    const err = new InvalidURLError('bad url', 'not a url', 'config');
    expect(err.url).toBe('not a url');
    expect(err.stage).toBe('config');
  });
});

describe('isInvalidURLError', () => {
  it('returns true for instances of InvalidURLError', () => {
    expect(isInvalidURLError(new InvalidURLError('bad url', '::', 'request'))).toBe(true);
  });

  it('returns false for non InvalidURLError errors', () => {
    expect(isInvalidURLError(new Error('boom'))).toBe(false);
  });
});

describe('getInvalidURLError', () => {
  it('unwraps nested causes', () => {
    const err = new InvalidURLError('bad url', '::', 'request');
    expect(getInvalidURLError(new Error('outer', { cause: err }))).toBe(err);
  });

  it('returns null when no InvalidURLError exists', () => {
    expect(getInvalidURLError(new Error('outer', { cause: new Error('inner') }))).toBeNull();
  });
});

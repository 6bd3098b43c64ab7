import { describe, expect, it } from 'vitest';
import { APIError, errorEnvelopeSchema, getAPIError, isAPIError } from './apiError.js';
import { ErrorBodyError } from './errorBodyError.js';
import { HTTPError } from './httpError.js';

describe('APIError', () => {
  it('carries the envelope message unchanged', () => {
    const response = new Response(null, { status: 400, statusText: 'Bad Request' });
    const err = new APIError(response, { error: { message: 'X' } });

    expect(err.message).toBe('X');
    expect(err.name).toBe('APIError');
    expect(err.statusCode).toBe(400);
    expect(err.statusDescription).toBe('Bad Request');
    expect(err.response).toBe(response);
    expect(err).toBeInstanceOf(HTTPError);
  });

  it('prefers the status details reported in the envelope', () => {
    const response = new Response(null, { status: 403 });
    const err = new APIError(response, {
      error: { statuscode: 4031, statusdesc: 'Forbidden', errormessage: 'Not allowed' },
    });

    expect(err.message).toBe('Not allowed');
    expect(err.statusCode).toBe(4031);
    expect(err.statusDescription).toBe('Forbidden');
  });

  it('uses message over errormessage', () => {
    const err = new APIError(new Response(null, { status: 400 }), {
      error: { message: 'first', errormessage: 'second' },
    });

    expect(err.message).toBe('first');
  });
});

describe('errorEnvelopeSchema', () => {
  it('accepts the envelope with a message', () => {
    expect(errorEnvelopeSchema.safeParse({ error: { message: 'bad request' } }).success).toBe(true);
  });

  it('rejects an envelope without any message', () => {
    expect(errorEnvelopeSchema.safeParse({ error: { statuscode: 500 } }).success).toBe(false);
  });

  it('rejects a body without the error field', () => {
    expect(errorEnvelopeSchema.safeParse({ message: 'bad request' }).success).toBe(false);
  });
});

describe('isAPIError', () => {
  it('returns true through a cause chain', () => {
    const err = new APIError(new Response(null, { status: 500 }), { error: { message: 'boom' } });
    expect(isAPIError(new Error('outer', { cause: err }))).toBe(true);
    expect(getAPIError(new Error('outer', { cause: err }))).toBe(err);
  });

  it('does not match an error body failure', () => {
    const err = new ErrorBodyError(new Response(null, { status: 500 }), 'unparsable');
    expect(isAPIError(err)).toBe(false);
  });
});

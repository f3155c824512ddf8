import { describe, it, expect } from 'vitest';
import { response } from '../../__mocks__/index.js';
import { CancelledError, ClientError, ErrorKind } from '../../errors/index.js';
import { classifyError, classifyResponse, isAuthRejection } from '../classify.js';

describe('classifyResponse', () => {
  it('should treat 2xx as success', () => {
    expect(classifyResponse(response(200, { id: 'a' }), 'accounts')).toEqual({
      type: 'success',
      response: { id: 'a' },
    });
    expect(classifyResponse(response(204), 'orders')).toEqual({ type: 'success', response: undefined });
  });

  it('should treat 429 and 5xx as retryable', () => {
    const throttled = classifyResponse(response(429, { detail: 'Request was throttled.' }), 'quotes');
    const unavailable = classifyResponse(response(503, 'Service unavailable'), 'quotes');

    expect(throttled.type).toBe('retryable_failure');
    expect(unavailable.type).toBe('retryable_failure');
  });

  it('should treat other 4xx as fatal', () => {
    const outcome = classifyResponse(response(404, { detail: 'Not found.' }), 'instruments');

    expect(outcome.type).toBe('fatal_failure');
    expect(outcome.type !== 'success' && outcome.error.message).toBe('Not found.');
  });
});

describe('classifyError', () => {
  it('should treat cancellation as cancelled', () => {
    expect(classifyError(new CancelledError(), 'quotes').type).toBe('cancelled');
  });

  it('should treat network errors as retryable', () => {
    const outcome = classifyError(new TypeError('fetch failed'), 'quotes');

    expect(outcome.type).toBe('retryable_failure');
    expect(outcome.type !== 'success' && outcome.error.kind).toBe(ErrorKind.TransportError);
  });

  it('should keep non-retryable errors fatal', () => {
    expect(classifyError(ClientError.notLoggedIn('GET /accounts/'), 'accounts').type).toBe('fatal_failure');
  });
});

describe('isAuthRejection', () => {
  it('should match only a 401 answer', () => {
    expect(isAuthRejection(classifyResponse(response(401, { detail: 'Invalid token.' }), 'accounts'))).toBe(true);
    expect(isAuthRejection(classifyResponse(response(403, { detail: 'Forbidden.' }), 'accounts'))).toBe(false);
    expect(isAuthRejection(classifyResponse(response(500), 'accounts'))).toBe(false);
  });
});

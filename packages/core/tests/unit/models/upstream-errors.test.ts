import { describe, expect, it } from 'vitest';
import { getStatusCode, toUpstreamError } from '../../../src/models/upstream-errors.js';
import { ApiError, ConnectionError, RateLimitError, TimeoutError } from '../../../src/utils/errors.js';

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('getStatusCode', () => {
  it('reads status, statusCode and response.status', () => {
    expect(getStatusCode({ status: 503 })).toBe(503);
    expect(getStatusCode({ statusCode: 404 })).toBe(404);
    expect(getStatusCode({ response: { status: 429 } })).toBe(429);
    expect(getStatusCode(new Error('plain'))).toBeUndefined();
  });
});

describe('toUpstreamError', () => {
  it('maps 429 to a rate limit', () => {
    const mapped = toUpstreamError(httpError('Resource exhausted', 429), 'gemini');
    expect(mapped).toBeInstanceOf(RateLimitError);
    expect(mapped.message).toBe('Resource exhausted');
  });

  it('maps gateway timeouts and timeout messages', () => {
    expect(toUpstreamError(httpError('Gateway', 504), 'gemini')).toBeInstanceOf(TimeoutError);
    expect(toUpstreamError(new Error('DEADLINE_EXCEEDED'), 'gemini')).toBeInstanceOf(TimeoutError);
  });

  it('maps network failures', () => {
    const err = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(toUpstreamError(err, 'gemini')).toBeInstanceOf(ConnectionError);
    expect(toUpstreamError(new TypeError('fetch failed'), 'gemini')).toBeInstanceOf(ConnectionError);
  });

  it('maps other statuses to APIError', () => {
    const mapped = toUpstreamError(httpError('Internal error', 500), 'gemini');
    expect(mapped).toBeInstanceOf(ApiError);
    expect(mapped.name).toBe('APIError');
  });

  it('passes through errors that are already classified', () => {
    const original = new RateLimitError('slow down', 'gemini');
    expect(toUpstreamError(original, 'gemini')).toBe(original);
  });

  it('leaves unclassified errors alone', () => {
    const original = new Error('something odd');
    expect(toUpstreamError(original, 'gemini')).toBe(original);
  });
});

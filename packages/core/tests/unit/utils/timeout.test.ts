import { describe, expect, it } from 'vitest';
import { ApiError, RateLimitError, TimeoutError, isRecoverableError } from '../../../src/utils/errors.js';
import { mulberry32, pick } from '../../../src/utils/random.js';
import { withTimeout } from '../../../src/utils/timeout.js';

describe('withTimeout', () => {
  it('resolves a fast promise', async () => {
    await expect(withTimeout(Promise.resolve('done'), 100)).resolves.toBe('done');
  });

  it('rejects with TimeoutError when the timer wins', async () => {
    const slow = new Promise<string>(() => undefined);
    await expect(withTimeout(slow, 5, 'text generation')).rejects.toThrow(
      'text generation timed out after 5ms',
    );
  });

  it('passes through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100)).rejects.toThrow('boom');
  });
});

describe('isRecoverableError', () => {
  it('treats transient upstream errors as recoverable', () => {
    expect(isRecoverableError(new RateLimitError('x'))).toBe(true);
    expect(isRecoverableError(new TimeoutError('x'))).toBe(true);
    expect(isRecoverableError(new ApiError('x'))).toBe(true);
    expect(isRecoverableError(new Error('x'))).toBe(false);
    expect(isRecoverableError('x')).toBe(false);
  });
});

describe('mulberry32', () => {
  it('replays the same sequence from the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const first = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(first);
    expect(first.every((n) => n >= 0 && n < 1)).toBe(true);
  });

  it('feeds pick', () => {
    expect(pick({ next: () => 0.99 }, ['a', 'b', 'c'])).toBe('c');
    expect(() => pick({ next: () => 0 }, [])).toThrow(RangeError);
  });
});

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { RateLimitedError, parseRetryAfter, retryOnRateLimit } from '../retry.js';
import type { RetryPolicy } from '../retry.js';

beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

function recordingPolicy(): RetryPolicy & { slept: number[] } {
  const slept: number[] = [];
  return {
    slept,
    maxAttempts: 3,
    backoff: (attempt) => (attempt + 1) * 5000,
    sleep: async (ms) => {
      slept.push(ms);
    },
  };
}

const isRateLimited = (err: unknown): boolean => err instanceof RateLimitedError;

describe('retryOnRateLimit', () => {
  it('retries rate limits with growing backoff', async () => {
    const policy = recordingPolicy();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError('Test'))
      .mockRejectedValueOnce(new RateLimitedError('Test'))
      .mockResolvedValueOnce('done');

    expect(await retryOnRateLimit(fn, isRateLimited, policy)).toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(policy.slept).toEqual([5000, 10000]);
  });

  it('prefers the server-requested delay', async () => {
    const policy = recordingPolicy();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError('Test', 1500))
      .mockResolvedValueOnce('done');

    await retryOnRateLimit(fn, isRateLimited, policy);

    expect(policy.slept).toEqual([1500]);
  });

  it('gives up after the last attempt', async () => {
    const policy = recordingPolicy();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new RateLimitedError('Test'));

    await expect(retryOnRateLimit(fn, isRateLimited, policy)).rejects.toThrow(
      'Test API rate limited (429)',
    );
    expect(fn).toHaveBeenCalledTimes(3);
    expect(policy.slept).toEqual([5000, 10000]);
  });

  it('rethrows other errors at once', async () => {
    const policy = recordingPolicy();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('invalid api key'));

    await expect(retryOnRateLimit(fn, isRateLimited, policy)).rejects.toThrow('invalid api key');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(policy.slept).toEqual([]);
  });
});

describe('parseRetryAfter', () => {
  it('converts seconds to milliseconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter('0.5')).toBe(500);
  });

  it('ignores missing or non-numeric headers', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT')).toBeUndefined();
  });
});

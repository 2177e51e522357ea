import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Rate limiting ────────────────────────────────────────────

/** Thrown by a provider call that was refused with HTTP 429. */
export class RateLimitedError extends Error {
  /** Server-requested delay, when it sent one. */
  readonly retryAfterMs: number | undefined;

  constructor(provider: string, retryAfterMs?: number) {
    super(`${provider} API rate limited (429)`);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay after the given 0-based failed attempt. */
  backoff: (attempt: number) => number;
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: LIMITS.LLM_ATTEMPTS,
  backoff: (attempt) => (attempt + 1) * TIMEOUTS.LLM_BACKOFF_STEP,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Run `fn`, waiting and retrying while `isRateLimited` says the failure
 * was a 429. Any other error, or the last rate limit, is rethrown.
 */
export async function retryOnRateLimit<T>(
  fn: () => Promise<T>,
  isRateLimited: (err: unknown) => boolean,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimited(err) || attempt >= policy.maxAttempts - 1) throw err;

      const waitMs = err instanceof RateLimitedError && err.retryAfterMs !== undefined
        ? err.retryAfterMs
        : policy.backoff(attempt);
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await policy.sleep(waitMs);
    }
  }
}

/** `Retry-After` seconds → milliseconds; undefined when absent or not numeric. */
export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

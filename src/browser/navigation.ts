import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { attempt } from '../utils/outcome.js';
import type { PageDriver, WaitCondition } from './driver.js';

// ── Public types ─────────────────────────────────────────────

export type NavigationStrategy = 'network-idle' | 'dom-content-loaded' | 'title-probe';

export type NavigationState =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'degraded' }
  | { kind: 'probing' }
  | { kind: 'done'; strategy: NavigationStrategy }
  | { kind: 'failed' };

export type NavigationEvent =
  | { type: 'loaded' }
  | { type: 'timed-out'; reason: string }
  | { type: 'probed'; title: string };

export interface NavigationPolicy {
  maxAttempts: number;
  timeout: number;
  /** Delay before the given 1-based attempt. */
  retryDelay: (attempt: number) => number;
}

export interface NavigationResult {
  success: true;
  title: string;
  strategy: NavigationStrategy;
  /** Page loads issued, the degraded one included. */
  attempts: number;
}

// ── Error ────────────────────────────────────────────────────

export class NavigationError extends Error {
  readonly exitCode = 3;
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, reason: string) {
    super(`Could not navigate to ${url} after ${String(attempts)} attempts: ${reason}`);
    this.name = 'NavigationError';
    this.url = url;
    this.attempts = attempts;
  }
}

// ── Backoff policy ───────────────────────────────────────────

export function retryDelay(attempt: number): number {
  return attempt > 1 ? TIMEOUTS.NAVIGATION_RETRY_DELAY : 0;
}

export const DEFAULT_NAVIGATION_POLICY: NavigationPolicy = {
  maxAttempts: LIMITS.NAVIGATION_ATTEMPTS,
  timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
  retryDelay,
};

// ── State machine (pure) ─────────────────────────────────────

/**
 * attempting(1..max) → degraded → probing → done | failed.
 * A non-empty title while probing counts as a partial load.
 */
export function nextNavigationState(
  state: NavigationState,
  event: NavigationEvent,
  maxAttempts: number = LIMITS.NAVIGATION_ATTEMPTS,
): NavigationState {
  switch (state.kind) {
    case 'attempting':
      if (event.type === 'loaded') return { kind: 'done', strategy: 'network-idle' };
      if (event.type === 'timed-out') {
        return state.attempt < maxAttempts
          ? { kind: 'attempting', attempt: state.attempt + 1 }
          : { kind: 'degraded' };
      }
      break;

    case 'degraded':
      if (event.type === 'loaded') return { kind: 'done', strategy: 'dom-content-loaded' };
      if (event.type === 'timed-out') return { kind: 'probing' };
      break;

    case 'probing':
      if (event.type === 'probed') {
        return event.title
          ? { kind: 'done', strategy: 'title-probe' }
          : { kind: 'failed' };
      }
      break;

    case 'done':
    case 'failed':
      return state;
  }

  throw new Error(`Unexpected navigation event "${event.type}" in state "${state.kind}"`);
}

// ── Driver loop ──────────────────────────────────────────────

/**
 * Get the page to a usable state for `url`. Throws NavigationError
 * only when every strategy has been exhausted.
 */
export async function navigateTo(
  driver: PageDriver,
  url: string,
  policy: NavigationPolicy = DEFAULT_NAVIGATION_POLICY,
): Promise<NavigationResult> {
  log.nav(`Navigating to URL: ${url}`);

  let state: NavigationState = { kind: 'attempting', attempt: 1 };
  let attempts = 0;
  let lastReason = 'unknown failure';
  let probedTitle = '';

  for (;;) {
    switch (state.kind) {
      case 'attempting': {
        const delay = policy.retryDelay(state.attempt);
        if (delay > 0) {
          log.detail(`Retrying in ${String(delay / 1000)} seconds...`);
          await driver.wait(delay);
        }
        attempts++;
        const event = await load(driver, url, 'networkidle', policy.timeout);
        if (event.type === 'timed-out') {
          lastReason = event.reason;
          log.warn(`Navigation attempt ${String(state.attempt)} failed: ${event.reason}`);
        }
        state = nextNavigationState(state, event, policy.maxAttempts);
        break;
      }

      case 'degraded': {
        log.detail("All navigation attempts failed. Trying with 'domcontentloaded'...");
        attempts++;
        const event = await load(driver, url, 'domcontentloaded', policy.timeout);
        if (event.type === 'timed-out') {
          lastReason = event.reason;
          log.warn(`Final navigation attempt failed: ${event.reason}`);
        }
        state = nextNavigationState(state, event, policy.maxAttempts);
        break;
      }

      case 'probing': {
        probedTitle = await readTitle(driver);
        if (probedTitle) {
          log.detail(`Partial page load detected. Page title: ${probedTitle}`);
        }
        state = nextNavigationState(state, { type: 'probed', title: probedTitle }, policy.maxAttempts);
        break;
      }

      case 'done': {
        const title = state.strategy === 'title-probe' ? probedTitle : await readTitle(driver);
        log.nav(`Reached ${url} (${state.strategy}), title: ${title || '(empty)'}`);
        return { success: true, title, strategy: state.strategy, attempts };
      }

      case 'failed':
        throw new NavigationError(url, attempts, lastReason);
    }
  }
}

// ── I/O helpers ──────────────────────────────────────────────

async function load(
  driver: PageDriver,
  url: string,
  waitUntil: WaitCondition,
  timeout: number,
): Promise<NavigationEvent> {
  const outcome = await attempt(() => driver.goto(url, { waitUntil, timeout }));
  return outcome.ok ? { type: 'loaded' } : { type: 'timed-out', reason: outcome.error };
}

/** Empty string when the title cannot be read. */
export async function readTitle(driver: PageDriver): Promise<string> {
  const outcome = await attempt(() => driver.title());
  if (!outcome.ok) {
    log.debug(`Could not read page title: ${outcome.error}`);
    return '';
  }
  return outcome.value;
}

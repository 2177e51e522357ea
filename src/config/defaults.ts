/**
 * Default configuration values.
 * Timeouts are per call; nothing cancels across operations.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_NAVIGATION_TIMEOUT: 15_000,
  SELECTOR_TIMEOUT: 2_000,
  NAVIGATION_RETRY_DELAY: 3_000,
  CLICK_SETTLE: 1_000,
  REVEAL_SETTLE: 1_000,
  STEP_SETTLE: 1_000,
  LLM_BACKOFF_STEP: 5_000,
} as const;

export const LIMITS = {
  NAVIGATION_ATTEMPTS: 3,
  LLM_ATTEMPTS: 3,
  CONTENT_PREVIEW_CHARS: 200,
  /** Longest `wait` action accepted, in seconds. */
  MAX_WAIT_SECONDS: 60,
} as const;

export const TRANSLATION = {
  MAX_OUTPUT_TOKENS: 300,
  TEMPERATURE: 0.2,
  DEFAULT_PAGE_CONTEXT: 'ecommerce website',
} as const;

// Mobile emulation surfaces the login drawers some storefronts hide on desktop.
export const MOBILE_DEVICE = {
  viewport: { width: 390, height: 844 },
  userAgent:
    'Mozilla/5.0 (iPhone; CPU iPhone OS 14_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/14.0 Mobile/15E148 Safari/604.1',
} as const;

export const DEFAULT_CONFIG_PATH = '.stepcheck.yaml';
export const DEFAULT_ARTIFACTS_DIR = '.artifacts';

/**
 * Browser execution module.
 * Deterministic Playwright layer — no LLM calls.
 * Receives structured actions, executes them, reports booleans.
 */

export { createPlaywrightDriver } from './driver.js';
export type { PageDriver, GotoOptions, WaitCondition } from './driver.js';
export { launchSession, createSessionLauncher } from './session.js';
export type { BrowserSession, SessionConfig, SessionLauncher } from './session.js';
export { attachDiagnostics } from './capture.js';
export { executeAction, runSelectorChain, revealAccountUi } from './executor.js';
export type { ChainOutcome } from './executor.js';
export {
  navigateTo,
  nextNavigationState,
  retryDelay,
  readTitle,
  NavigationError,
  DEFAULT_NAVIGATION_POLICY,
} from './navigation.js';
export type {
  NavigationEvent,
  NavigationPolicy,
  NavigationResult,
  NavigationState,
  NavigationStrategy,
} from './navigation.js';
export {
  buildSelectorChain,
  CLICK_FALLBACKS,
  FILL_FALLBACKS,
  ACCOUNT_TRIGGER_SELECTORS,
} from './selectors.js';
export type { FallbackRule } from './selectors.js';

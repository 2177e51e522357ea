import type {
  Action,
  CheckAction,
  ClickAction,
  FillAction,
  NavigateAction,
} from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { attempt, describeError } from '../utils/outcome.js';
import type { PageDriver } from './driver.js';
import {
  ACCOUNT_TRIGGER_SELECTORS,
  CLICK_FALLBACKS,
  FILL_FALLBACKS,
  buildSelectorChain,
} from './selectors.js';

// ── Public types ─────────────────────────────────────────────

export interface ChainOutcome {
  success: boolean;
  /** Selector that worked, when one did. */
  selector?: string;
  /** How many selectors were tried, the successful one included. */
  attempted: number;
}

// ── Entry point ──────────────────────────────────────────────

/**
 * Execute one Action against the current page.
 * Resolves to false on any failure; never throws.
 */
export async function executeAction(
  driver: PageDriver,
  action: Action,
): Promise<boolean> {
  log.detail(`Executing: ${action.description}`);

  try {
    return await performAction(driver, action);
  } catch (err) {
    log.error(`Error executing browser action: ${describeError(err)}`);
    return false;
  }
}

// ── Step dispatch ────────────────────────────────────────────

async function performAction(
  driver: PageDriver,
  action: Action,
): Promise<boolean> {
  switch (action.action) {
    case 'click':
      return executeClick(driver, action);

    case 'fill':
      return executeFill(driver, action);

    case 'navigate':
      return executeNavigate(driver, action);

    case 'wait':
      await driver.wait(action.time * 1000);
      log.detail(`Waited for ${String(action.time)} seconds`);
      return true;

    case 'check':
      return executeCheck(driver, action);

    case 'unknown':
      log.warn(`Unknown action: ${action.description}`);
      return false;
  }
}

// ── Click ────────────────────────────────────────────────────

async function executeClick(
  driver: PageDriver,
  action: ClickAction,
): Promise<boolean> {
  if (!action.selector) {
    log.warn('No selector provided for click action');
    return false;
  }

  await revealAccountUi(driver);

  const chain = buildSelectorChain(action.selector, action.description, CLICK_FALLBACKS);
  const outcome = await runSelectorChain(driver, chain, (selector) =>
    driver.click(selector, TIMEOUTS.SELECTOR_TIMEOUT),
  );

  if (!outcome.success) return false;

  log.detail(`Clicked using selector: ${outcome.selector ?? ''}`);
  await driver.wait(TIMEOUTS.CLICK_SETTLE);
  return true;
}

/**
 * Click the first account icon present on the page, if any, so that
 * login forms tucked into drawers become reachable.
 */
export async function revealAccountUi(driver: PageDriver): Promise<string | undefined> {
  for (const trigger of ACCOUNT_TRIGGER_SELECTORS) {
    const found = await attempt(() => driver.exists(trigger));
    if (!found.ok) {
      log.debug(`Account trigger probe ${trigger} failed: ${found.error}`);
      continue;
    }
    if (!found.value) continue;

    log.detail(`Found possible account button ${trigger}, clicking...`);
    const clicked = await attempt(async () => {
      await driver.click(trigger, TIMEOUTS.SELECTOR_TIMEOUT);
      await driver.wait(TIMEOUTS.REVEAL_SETTLE);
    });
    if (clicked.ok) return trigger;

    log.detail(`Account button ${trigger} not clickable: ${clicked.error}`);
  }

  return undefined;
}

// ── Fill ─────────────────────────────────────────────────────

async function executeFill(
  driver: PageDriver,
  action: FillAction,
): Promise<boolean> {
  if (!action.selector) {
    log.warn('No selector provided for fill action');
    return false;
  }

  const chain = buildSelectorChain(action.selector, action.description, FILL_FALLBACKS);
  const outcome = await runSelectorChain(driver, chain, (selector) =>
    driver.fill(selector, action.value, TIMEOUTS.SELECTOR_TIMEOUT),
  );

  if (outcome.success) {
    log.detail(`Filled ${action.description} using selector: ${outcome.selector ?? ''}`);
  }
  return outcome.success;
}

// ── Navigate ─────────────────────────────────────────────────

async function executeNavigate(
  driver: PageDriver,
  action: NavigateAction,
): Promise<boolean> {
  if (!action.url) {
    log.warn('No URL provided for navigate action');
    return false;
  }

  await driver.goto(action.url, {
    waitUntil: 'domcontentloaded',
    timeout: TIMEOUTS.ACTION_NAVIGATION_TIMEOUT,
  });
  log.detail(`Navigated to ${action.url}`);
  return true;
}

// ── Check ────────────────────────────────────────────────────

async function executeCheck(
  driver: PageDriver,
  action: CheckAction,
): Promise<boolean> {
  if (!action.text) {
    log.detail('Viewing page content');
    return true;
  }

  const content = await driver.content();
  const found = content.toLowerCase().includes(action.text.toLowerCase());
  log.detail(`Checking for text '${action.text}': ${found ? 'Found' : 'Not found'}`);
  return found;
}

// ── Selector chain ───────────────────────────────────────────

/**
 * Try each selector in order until `perform` succeeds. A selector that
 * already exists in the DOM is forced visible first. Stops at the first
 * success; later selectors are never touched.
 */
export async function runSelectorChain(
  driver: PageDriver,
  chain: readonly string[],
  perform: (selector: string) => Promise<void>,
): Promise<ChainOutcome> {
  let attempted = 0;

  for (const selector of chain) {
    attempted++;

    const found = await attempt(() => driver.exists(selector));
    if (found.ok && found.value) {
      const revealed = await attempt(() => driver.reveal(selector));
      if (!revealed.ok) {
        log.debug(`Could not force ${selector} visible: ${revealed.error}`);
      }
    }

    const result = await attempt(() => perform(selector));
    if (result.ok) {
      return { success: true, selector, attempted };
    }

    log.detail(`Failed with selector ${selector}: ${result.error}`);
  }

  return { success: false, attempted };
}

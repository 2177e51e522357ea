import path from 'node:path';

import type { LLMClient } from '../llm/index.js';
import type { RunVerdict, TestCase } from '../schema/index.js';
import { decideVerdict, previewContent } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { BrowserSession, SessionLauncher } from '../browser/session.js';
import type { PageDriver } from '../browser/driver.js';
import { executeAction } from '../browser/executor.js';
import { NavigationError, navigateTo } from '../browser/navigation.js';
import type { NavigationPolicy } from '../browser/navigation.js';
import * as log from '../utils/logger.js';
import { attempt, describeError } from '../utils/outcome.js';
import { describeSite, translateStep } from './translator.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorDeps {
  llm: LLMClient;
  launchSession: SessionLauncher;
  artifactsDir: string;
  /** hostname fragment → alternate URL for sites known to be unreliable */
  alternateSites?: Readonly<Record<string, string>> | undefined;
  navigationPolicy?: NavigationPolicy | undefined;
}

export interface ReachedSite {
  url: string;
  title: string;
  pageContext: string;
}

// ── Site-level fallback ──────────────────────────────────────

export function findAlternateSite(
  url: string,
  alternateSites: Readonly<Record<string, string>> = {},
): string | undefined {
  const lowered = url.toLowerCase();
  const entry = Object.entries(alternateSites).find(([fragment]) =>
    lowered.includes(fragment.toLowerCase()),
  );
  return entry?.[1];
}

/**
 * Navigate to `url`; when it belongs to an unreliable site and yields no
 * usable page, switch to that site's alternate and re-label the context.
 */
export async function reachSite(
  driver: PageDriver,
  url: string,
  deps: Pick<OrchestratorDeps, 'alternateSites' | 'navigationPolicy'>,
): Promise<ReachedSite> {
  const alternate = findAlternateSite(url, deps.alternateSites);

  let title: string;
  try {
    ({ title } = await navigateTo(driver, url, deps.navigationPolicy));
  } catch (err) {
    if (!(err instanceof NavigationError) || alternate === undefined) throw err;
    log.warn(`${url} appears to be unreachable: ${err.message}`);
    return reachAlternate(driver, alternate, deps);
  }

  if (title === '' && alternate !== undefined) {
    log.warn(`${url} loaded without a title; treating the site as unreachable`);
    return reachAlternate(driver, alternate, deps);
  }

  return { url, title, pageContext: describeSite(url) };
}

async function reachAlternate(
  driver: PageDriver,
  alternate: string,
  deps: Pick<OrchestratorDeps, 'navigationPolicy'>,
): Promise<ReachedSite> {
  log.nav(`Navigating to alternative site: ${alternate}`);
  const { title } = await navigateTo(driver, alternate, deps.navigationPolicy);
  return { url: alternate, title, pageContext: describeSite(alternate) };
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Run one test case end to end. Never throws: any failure becomes an
 * Error verdict, and the session is closed on every path.
 */
export async function runTestCase(
  deps: OrchestratorDeps,
  testCase: TestCase,
): Promise<RunVerdict> {
  let session: BrowserSession | undefined;

  try {
    session = await deps.launchSession();
    return await runSteps(deps, session.driver, testCase);
  } catch (err) {
    const message = describeError(err);
    log.error(`Error in test execution: ${message}`);
    if (err instanceof Error && err.stack) log.debug(err.stack);
    return { result: 'Error', expectedOutput: testCase.expectedOutput, error: message };
  } finally {
    if (session) await closeSession(session);
  }
}

async function runSteps(
  deps: OrchestratorDeps,
  driver: PageDriver,
  testCase: TestCase,
): Promise<RunVerdict> {
  const site = await reachSite(driver, testCase.url, deps);

  await capture(driver, deps.artifactsDir, 'before.png');
  log.info(`Current page title: ${site.title}`);

  const stepResults: boolean[] = [];
  const total = testCase.steps.length;

  for (let i = 0; i < total; i++) {
    const step = testCase.steps[i] ?? '';
    log.step(i, total, step);

    const action = await translateStep(deps.llm, step, site.pageContext);
    const success = await executeAction(driver, action);
    stepResults.push(success);
    log.stepResult(i, total, success, action.description);

    await capture(driver, deps.artifactsDir, `step-${String(i + 1)}.png`);
    await driver.wait(TIMEOUTS.STEP_SETTLE);
  }

  await capture(driver, deps.artifactsDir, 'final.png');

  const content = await driver.content();
  const finalUrl = driver.url();
  log.info(`Final URL: ${finalUrl}`);
  log.info(`Checking for expected output: '${testCase.expectedOutput}'`);

  const result = decideVerdict(content, finalUrl, testCase.expectedOutput);
  log.verdict(result, describeVerdict(result, content, finalUrl, testCase.expectedOutput));

  return {
    result,
    expectedOutput: testCase.expectedOutput,
    finalUrl,
    stepResults,
    contentPreview: previewContent(content),
  };
}

// ── Helpers ──────────────────────────────────────────────────

async function capture(driver: PageDriver, dir: string, name: string): Promise<void> {
  const filePath = path.join(dir, name);
  const outcome = await attempt(() => driver.screenshot(filePath));
  if (outcome.ok) {
    log.detail(`Screenshot saved as ${filePath}`);
  } else {
    log.warn(`Screenshot ${name} failed: ${outcome.error}`);
  }
}

async function closeSession(session: BrowserSession): Promise<void> {
  const outcome = await attempt(() => session.close());
  if (!outcome.ok) {
    log.warn(`Error during cleanup: ${outcome.error}`);
  }
}

function describeVerdict(
  result: 'Pass' | 'Fail',
  content: string,
  url: string,
  expected: string,
): string {
  if (result === 'Fail') return 'expected output not found in page content or URL';

  const needle = expected.toLowerCase();
  if (content.toLowerCase().includes(needle)) return 'expected output found in page content';
  if (url.toLowerCase().includes(needle)) return 'expected output matched the final URL';
  return 'final URL contains an account indicator';
}

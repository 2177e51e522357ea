import type { RunVerdict, SuiteConfig, SuiteTest, TestCase } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

/** `label` names the run, e.g. for its artifact directory. */
export type TestRunner = (testCase: TestCase, label: string) => Promise<RunVerdict>;

export interface SuiteEntry {
  name: string;
  testCase: TestCase;
  verdict: RunVerdict;
  /** Present when the primary run timed out and a fallback ran. */
  fallback?: { testCase: TestCase; verdict: RunVerdict };
}

export interface SmokeRun {
  testCase: TestCase;
  verdict: RunVerdict;
}

export interface SuiteResult {
  smoke?: SmokeRun;
  entries: SuiteEntry[];
  /** True when the smoke test failed and nothing else ran. */
  aborted: boolean;
}

// ── Suite loop ───────────────────────────────────────────────

/**
 * Run the smoke test (if any), then every test in order. A test whose run
 * errors on a timeout is retried once against its fallback test case.
 */
export async function runSuite(
  config: Pick<SuiteConfig, 'smokeTest' | 'tests'>,
  runOne: TestRunner,
): Promise<SuiteResult> {
  let smoke: SmokeRun | undefined;

  if (config.smokeTest) {
    log.section(`Smoke test: ${config.smokeTest.url}`);
    smoke = {
      testCase: config.smokeTest,
      verdict: await runOne(config.smokeTest, 'smoke'),
    };

    if (smoke.verdict.result !== 'Pass') {
      log.warn(
        'Smoke test did not pass. Check network connectivity and browser configuration.',
      );
      return { smoke, entries: [], aborted: true };
    }
  }

  const entries: SuiteEntry[] = [];

  for (const test of config.tests) {
    log.section(`Test: ${test.name}`);
    entries.push(await runEntry(test, runOne));
  }

  return smoke ? { smoke, entries, aborted: false } : { entries, aborted: false };
}

async function runEntry(test: SuiteTest, runOne: TestRunner): Promise<SuiteEntry> {
  const testCase = toTestCase(test);
  const verdict = await runOne(testCase, test.name);

  if (!test.fallback || !isTimeoutError(verdict)) {
    return { name: test.name, testCase, verdict };
  }

  log.warn(`${test.name}: site appears to be unreachable. Trying fallback test...`);
  const fallbackVerdict = await runOne(test.fallback, `${test.name}-fallback`);

  return {
    name: test.name,
    testCase,
    verdict,
    fallback: { testCase: test.fallback, verdict: fallbackVerdict },
  };
}

export function isTimeoutError(verdict: RunVerdict): boolean {
  return verdict.result === 'Error' && verdict.error.toLowerCase().includes('timeout');
}

function toTestCase(test: SuiteTest): TestCase {
  return { url: test.url, steps: test.steps, expectedOutput: test.expectedOutput };
}

// ── Outcome ──────────────────────────────────────────────────

/** The verdict that counts for an entry: the fallback's, when one ran. */
export function effectiveVerdict(entry: SuiteEntry): RunVerdict {
  return entry.fallback?.verdict ?? entry.verdict;
}

/** 0 all pass, 1 any fail, 3 any error (errors dominate). */
export function suiteExitCode(result: SuiteResult): number {
  const verdicts = result.aborted && result.smoke
    ? [result.smoke.verdict]
    : result.entries.map(effectiveVerdict);

  if (verdicts.some((v) => v.result === 'Error')) return 3;
  if (verdicts.some((v) => v.result === 'Fail')) return 1;
  return 0;
}

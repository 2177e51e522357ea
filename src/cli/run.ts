import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type { RunVerdict, TestCase } from '../schema/index.js';
import { testCaseSchema } from '../schema/index.js';
import { createLLMClient, loadLLMConfig, missingCredential } from '../llm/index.js';
import type { LLMClient, LLMOverrides } from '../llm/index.js';
import { llmProviderSchema } from '../llm/client.js';
import { createSessionLauncher } from '../browser/session.js';
import { runTestCase } from '../core/orchestrator.js';
import { runSuite, suiteExitCode, effectiveVerdict } from '../core/suite.js';
import type { SuiteResult, TestRunner } from '../core/suite.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import { DEFAULT_ARTIFACTS_DIR, DEFAULT_CONFIG_PATH } from '../config/defaults.js';
import { loadSuiteConfig } from '../config/loader.js';
import type { SuiteConfig } from '../schema/config.js';
import * as log from '../utils/logger.js';
import { describeError } from '../utils/outcome.js';

const EXIT_CONFIG_ERROR = 4;

// ── Credential precondition ──────────────────────────────────

/**
 * Build the LLM client, or warn and return undefined when the
 * provider's API key is absent. Checked once, before any run.
 */
export function prepareClient(overrides: LLMOverrides): LLMClient | undefined {
  const config = loadLLMConfig(overrides);
  const missing = missingCredential(config);

  if (missing !== undefined) {
    log.warn(`${missing} environment variable not set!`);
    log.detail('Please set your API key in the .env file or environment variables.');
    log.detail(`Example: ${missing}=your-api-key-here`);
    return undefined;
  }

  return createLLMClient(config);
}

// ── Alternate-site parsing ───────────────────────────────────

/** `["shop.test=https://mirror.test/login"]` → `{ "shop.test": "https://mirror.test/login" }` */
export function parseAlternates(pairs: readonly string[]): Record<string, string> {
  const sites: Record<string, string> = {};

  for (const pair of pairs) {
    const eqIndex = pair.indexOf('=');
    if (eqIndex <= 0) {
      throw new Error(`Invalid alternate "${pair}" (expected host=url)`);
    }
    sites[pair.slice(0, eqIndex).trim()] = pair.slice(eqIndex + 1).trim();
  }

  return sites;
}

// ── Runner wiring ────────────────────────────────────────────

function createRunner(
  client: LLMClient,
  artifactsRoot: string,
  headless: boolean,
  alternateSites: Readonly<Record<string, string>>,
): TestRunner {
  return (testCase: TestCase, label: string): Promise<RunVerdict> => {
    const artifactsDir = path.join(artifactsRoot, label);
    return runTestCase(
      {
        llm: client,
        launchSession: createSessionLauncher({ headless, screenshotDir: artifactsDir }),
        artifactsDir,
        alternateSites,
      },
      testCase,
    );
  };
}

// ── Artifact writing ─────────────────────────────────────────

async function writeReports(
  result: SuiteResult,
  artifactsRoot: string,
  exitCode: number,
): Promise<void> {
  await mkdir(artifactsRoot, { recursive: true });

  if (result.smoke) {
    await writeReport(artifactsRoot, 'smoke', result.smoke.testCase, result.smoke.verdict);
  }

  for (const entry of result.entries) {
    await writeReport(artifactsRoot, entry.name, entry.testCase, entry.verdict);
    if (entry.fallback) {
      await writeReport(
        artifactsRoot,
        `${entry.name}-fallback`,
        entry.fallback.testCase,
        entry.fallback.verdict,
      );
    }
  }

  await writeFile(
    path.join(artifactsRoot, 'summary.json'),
    serializeJSON(generateJSON(result, exitCode)) + '\n',
    'utf-8',
  );
}

async function writeReport(
  artifactsRoot: string,
  label: string,
  testCase: TestCase,
  verdict: RunVerdict,
): Promise<void> {
  const dir = path.join(artifactsRoot, label);
  await mkdir(dir, { recursive: true });
  await writeFile(
    path.join(dir, 'report.md'),
    generateMarkdown(label, testCase, verdict),
    'utf-8',
  );
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(result: SuiteResult): void {
  process.stderr.write(`\n--- stepcheck Result ---\n`);

  if (result.smoke) {
    process.stderr.write(`smoke:   ${result.smoke.verdict.result}\n`);
  }
  if (result.aborted) {
    process.stderr.write(`Suite aborted: smoke test did not pass\n\n`);
    return;
  }

  for (const entry of result.entries) {
    const verdict = effectiveVerdict(entry);
    const via = entry.fallback ? ' (via fallback)' : '';
    const detail = verdict.result === 'Error'
      ? verdict.error
      : `${String(verdict.stepResults.filter(Boolean).length)}/${String(verdict.stepResults.length)} steps ok, final URL ${verdict.finalUrl}`;
    process.stderr.write(`${entry.name}: ${verdict.result}${via} — ${detail}\n`);
  }

  process.stderr.write('\n');
}

async function finish(
  result: SuiteResult,
  artifactsRoot: string,
  json: boolean,
): Promise<void> {
  const exitCode = suiteExitCode(result);

  await writeReports(result, artifactsRoot, exitCode);

  if (json) {
    process.stdout.write(serializeJSON(generateJSON(result, exitCode)) + '\n');
  }

  printSummary(result);
  process.exitCode = exitCode;
}

// ── Command registration ─────────────────────────────────────

export function registerTestCommand(program: Command): void {
  program
    .command('test')
    .description('Run one natural-language test case against a URL')
    .argument('<url>', 'Target URL to test')
    .requiredOption('-s, --step <text...>', 'Test steps, in order')
    .requiredOption('-e, --expect <text>', 'Text expected on the final page or URL')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory', DEFAULT_ARTIFACTS_DIR)
    .option('--headless', 'Run browser headless')
    .option('--alternate <pair...>', 'host=url alternates for unreliable sites')
    .option('--provider <name>', 'LLM provider (anthropic, openai, mock)')
    .option('--verbose', 'Log browser console and network traffic')
    .action(
      async (
        url: string,
        opts: {
          step: string[];
          expect: string;
          json?: true;
          reportPath: string;
          headless?: true;
          alternate?: string[];
          provider?: string;
          verbose?: true;
        },
      ) => {
        log.setVerbose(opts.verbose ?? false);

        let testCase: TestCase;
        let alternateSites: Record<string, string>;
        let client: LLMClient | undefined;
        try {
          testCase = testCaseSchema.parse({
            url,
            steps: opts.step,
            expectedOutput: opts.expect,
          });
          alternateSites = parseAlternates(opts.alternate ?? []);
          client = prepareClient({
            provider: opts.provider !== undefined
              ? llmProviderSchema.parse(opts.provider)
              : undefined,
          });
        } catch (err) {
          process.stderr.write(`Error: ${describeError(err)}\n`);
          process.exitCode = EXIT_CONFIG_ERROR;
          return;
        }

        if (!client) {
          process.exitCode = EXIT_CONFIG_ERROR;
          return;
        }

        const artifactsRoot = path.resolve(opts.reportPath);
        const runOne = createRunner(
          client,
          artifactsRoot,
          opts.headless ?? false,
          alternateSites,
        );

        log.section(`Test: ${url}`);
        const verdict = await runOne(testCase, 'test');

        await finish(
          { entries: [{ name: 'test', testCase, verdict }], aborted: false },
          artifactsRoot,
          opts.json ?? false,
        );
      },
    );
}

// ── Run command (config-driven suite) ───────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the test suite defined in a .stepcheck.yaml file')
    .option('--config <path>', 'Path to suite file', DEFAULT_CONFIG_PATH)
    .option('--test <name>', 'Run a single test by name')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory')
    .option('--verbose', 'Log browser console and network traffic')
    .action(
      async (opts: {
        config: string;
        test?: string;
        json?: true;
        reportPath?: string;
        verbose?: true;
      }) => {
        log.setVerbose(opts.verbose ?? false);

        let config: SuiteConfig;
        let client: LLMClient | undefined;
        try {
          config = await loadSuiteConfig(opts.config);
          client = prepareClient({ provider: config.provider, model: config.model });
        } catch (err) {
          process.stderr.write(`Config error: ${describeError(err)}\n`);
          process.exitCode = EXIT_CONFIG_ERROR;
          return;
        }

        if (!client) {
          process.exitCode = EXIT_CONFIG_ERROR;
          return;
        }

        // Filter to single test if --test specified
        const tests =
          opts.test !== undefined
            ? config.tests.filter((t) => t.name === opts.test)
            : config.tests;

        if (tests.length === 0) {
          process.stderr.write(`No test named "${opts.test ?? ''}" found in config\n`);
          process.exitCode = EXIT_CONFIG_ERROR;
          return;
        }

        const artifactsRoot = path.resolve(opts.reportPath ?? config.artifactsDir);
        const runOne = createRunner(
          client,
          artifactsRoot,
          config.headless,
          config.alternateSites,
        );

        const result = await runSuite(
          { smokeTest: config.smokeTest, tests },
          runOne,
        );

        await finish(result, artifactsRoot, opts.json ?? false);
      },
    );
}

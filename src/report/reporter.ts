import type { RunVerdict, TestCase } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputTest } from '../schema/jsonOutput.js';
import type { SuiteResult } from '../core/suite.js';
import { effectiveVerdict } from '../core/suite.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputTest };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(result: SuiteResult, exitCode: number): JsonOutput {
  const tests: JsonOutputTest[] = [];

  if (result.smoke) {
    tests.push(testToJSON('smoke', result.smoke.verdict, result.smoke.testCase));
  }

  for (const entry of result.entries) {
    const verdict = effectiveVerdict(entry);
    const testCase = entry.fallback?.testCase ?? entry.testCase;
    tests.push(testToJSON(entry.name, verdict, testCase));
  }

  return {
    version: JSON_OUTPUT_VERSION,
    exitCode,
    aborted: result.aborted,
    tests,
  };
}

function testToJSON(
  name: string,
  verdict: RunVerdict,
  testCase: TestCase,
): JsonOutputTest {
  const { url } = testCase;

  if (verdict.result === 'Error') {
    return {
      name,
      url,
      result: verdict.result,
      expectedOutput: verdict.expectedOutput,
      finalUrl: null,
      stepResults: [],
      contentPreview: null,
      error: verdict.error,
    };
  }

  return {
    name,
    url,
    result: verdict.result,
    expectedOutput: verdict.expectedOutput,
    finalUrl: verdict.finalUrl,
    stepResults: verdict.stepResults,
    contentPreview: verdict.contentPreview,
    error: null,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(
  name: string,
  testCase: TestCase,
  verdict: RunVerdict,
): string {
  const lines: string[] = [];

  lines.push(`# stepcheck Report: ${name}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **URL** | ${escapeMarkdownCell(testCase.url)} |`);
  lines.push(`| **Expected** | ${escapeMarkdownCell(verdict.expectedOutput)} |`);
  lines.push(`| **Result** | **${verdict.result}** ${verdictIcon(verdict.result)} |`);

  if (verdict.result === 'Error') {
    lines.push(`| **Error** | ${escapeMarkdownCell(verdict.error)} |`);
    lines.push('');
    return lines.join('\n');
  }

  lines.push(`| **Final URL** | ${escapeMarkdownCell(verdict.finalUrl)} |`);
  lines.push('');

  lines.push(`## Steps`);
  lines.push('');
  lines.push(`| # | Step | Result |`);
  lines.push(`|---|------|--------|`);

  testCase.steps.forEach((step, i) => {
    const ok = verdict.stepResults[i] ?? false;
    lines.push(
      `| ${String(i + 1)} | ${escapeMarkdownCell(step)} | ${ok ? 'OK ✅' : 'FAILED ❌'} |`,
    );
  });

  lines.push('');
  lines.push(`## Content preview`);
  lines.push('');
  lines.push('```html');
  lines.push(verdict.contentPreview);
  lines.push('```');
  lines.push('');

  return lines.join('\n');
}

// ── Formatting helpers ───────────────────────────────────────

function verdictIcon(result: RunVerdict['result']): string {
  switch (result) {
    case 'Pass':
      return '✅';
    case 'Fail':
      return '❌';
    case 'Error':
      return '💥';
  }
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

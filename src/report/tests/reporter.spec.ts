import { describe, expect, it } from 'vitest';

import type { RunVerdict, TestCase } from '../../schema/index.js';
import type { SuiteResult } from '../../core/suite.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../reporter.js';

const loginCase: TestCase = {
  url: 'https://shop.test',
  steps: ['View the page', 'Click | sign in'],
  expectedOutput: 'Welcome',
};

const passed: RunVerdict = {
  result: 'Pass',
  expectedOutput: 'Welcome',
  finalUrl: 'https://shop.test/account',
  stepResults: [true, false],
  contentPreview: '<h1>Welcome</h1>',
};

const errored: RunVerdict = {
  result: 'Error',
  expectedOutput: 'Welcome',
  error: 'Timeout 30000ms exceeded',
};

describe('generateJSON', () => {
  it('lists the smoke test first, with its URL', () => {
    const smokeCase: TestCase = {
      url: 'https://example.com',
      steps: ['View the page content'],
      expectedOutput: 'Welcome',
    };
    const result: SuiteResult = {
      smoke: { testCase: smokeCase, verdict: errored },
      entries: [],
      aborted: true,
    };

    expect(generateJSON(result, 3)).toEqual({
      version: '1.0',
      exitCode: 3,
      aborted: true,
      tests: [
        {
          name: 'smoke',
          url: 'https://example.com',
          result: 'Error',
          expectedOutput: 'Welcome',
          finalUrl: null,
          stepResults: [],
          contentPreview: null,
          error: 'Timeout 30000ms exceeded',
        },
      ],
    });
  });

  it('reports the fallback run when one happened', () => {
    const fallbackCase: TestCase = { ...loginCase, url: 'https://mirror.test' };
    const result: SuiteResult = {
      entries: [
        {
          name: 'login',
          testCase: loginCase,
          verdict: errored,
          fallback: { testCase: fallbackCase, verdict: passed },
        },
      ],
      aborted: false,
    };

    const [test] = generateJSON(result, 0).tests;

    expect(test).toEqual({
      name: 'login',
      url: 'https://mirror.test',
      result: 'Pass',
      expectedOutput: 'Welcome',
      finalUrl: 'https://shop.test/account',
      stepResults: [true, false],
      contentPreview: '<h1>Welcome</h1>',
      error: null,
    });
  });
});

describe('serializeJSON', () => {
  it('sorts keys at every level', () => {
    const result: SuiteResult = {
      entries: [{ name: 'login', testCase: loginCase, verdict: passed }],
      aborted: false,
    };

    const text = serializeJSON(generateJSON(result, 0));
    const parsed: unknown = JSON.parse(text);

    expect(text.startsWith('{\n  "aborted": false,\n  "exitCode": 0,\n  "tests": [')).toBe(true);
    expect(parsed).toMatchObject({ tests: [{ name: 'login' }] });
    const firstTestKeys = text
      .split('\n')
      .filter((line) => line.startsWith('      "'))
      .map((line) => line.trim().split('"')[1]);
    expect(firstTestKeys).toEqual([
      'contentPreview',
      'error',
      'expectedOutput',
      'finalUrl',
      'name',
      'result',
      'stepResults',
      'url',
    ]);
  });
});

describe('generateMarkdown', () => {
  it('renders fields, steps and the content preview', () => {
    expect(generateMarkdown('login', loginCase, passed).split('\n')).toEqual([
      '# stepcheck Report: login',
      '',
      '| Field | Value |',
      '|-------|-------|',
      '| **URL** | https://shop.test |',
      '| **Expected** | Welcome |',
      '| **Result** | **Pass** ✅ |',
      '| **Final URL** | https://shop.test/account |',
      '',
      '## Steps',
      '',
      '| # | Step | Result |',
      '|---|------|--------|',
      '| 1 | View the page | OK ✅ |',
      '| 2 | Click \\| sign in | FAILED ❌ |',
      '',
      '## Content preview',
      '',
      '```html',
      '<h1>Welcome</h1>',
      '```',
      '',
    ]);
  });

  it('renders only the error for an errored run', () => {
    expect(generateMarkdown('login', loginCase, errored).split('\n')).toEqual([
      '# stepcheck Report: login',
      '',
      '| Field | Value |',
      '|-------|-------|',
      '| **URL** | https://shop.test |',
      '| **Expected** | Welcome |',
      '| **Result** | **Error** 💥 |',
      '| **Error** | Timeout 30000ms exceeded |',
      '',
    ]);
  });
});

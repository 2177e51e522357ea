import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError, loadSuiteConfig, parseSuiteConfig } from '../loader.js';

const MINIMAL_YAML = `
tests:
  - name: login
    url: https://shop.test
    steps:
      - Click on sign in
    expectedOutput: My account
`;

describe('parseSuiteConfig', () => {
  it('fills in defaults', () => {
    const config = parseSuiteConfig(MINIMAL_YAML, 'yaml');

    expect(config.headless).toBe(true);
    expect(config.artifactsDir).toBe('.artifacts');
    expect(config.alternateSites).toEqual({});
    expect(config.smokeTest).toBeUndefined();
    expect(config.tests).toEqual([
      {
        name: 'login',
        url: 'https://shop.test',
        steps: ['Click on sign in'],
        expectedOutput: 'My account',
      },
    ]);
  });

  it('reads fallbacks, alternates and the provider from JSON', () => {
    const config = parseSuiteConfig(
      JSON.stringify({
        provider: 'mock',
        headless: false,
        alternateSites: { 'flaky.test': 'https://mirror.test/login' },
        smokeTest: { url: 'https://example.com', steps: ['View the page content'], expectedOutput: 'Example Domain' },
        tests: [
          {
            name: 'login',
            url: 'https://flaky.test',
            steps: ['Click on sign in'],
            expectedOutput: 'Welcome',
            fallback: { url: 'https://mirror.test', steps: ['View the page content'], expectedOutput: 'Mirror' },
          },
        ],
      }),
      'json',
    );

    expect(config.provider).toBe('mock');
    expect(config.headless).toBe(false);
    expect(config.alternateSites).toEqual({ 'flaky.test': 'https://mirror.test/login' });
    expect(config.tests[0]?.fallback?.url).toBe('https://mirror.test');
  });

  it('throws ConfigError on malformed YAML', () => {
    expect(() => parseSuiteConfig('tests: [unclosed', 'yaml')).toThrow(ConfigError);
  });

  it('throws ConfigError with an exit code of 4 on schema violations', () => {
    let caught: unknown;
    try {
      parseSuiteConfig('{"tests": []}', 'json');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ exitCode: 4, name: 'ConfigError' });
  });

  it('rejects an unknown provider', () => {
    expect(() => parseSuiteConfig(`provider: acme-llm\n${MINIMAL_YAML}`, 'yaml')).toThrow(ConfigError);
  });
});

describe('loadSuiteConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'stepcheck-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a YAML file from disk', async () => {
    const file = path.join(dir, '.stepcheck.yaml');
    await writeFile(file, MINIMAL_YAML, 'utf-8');

    const config = await loadSuiteConfig(file);

    expect(config.tests.map((t) => t.name)).toEqual(['login']);
  });

  it('wraps a missing file in ConfigError', async () => {
    const file = path.join(dir, 'missing.yaml');

    await expect(loadSuiteConfig(file)).rejects.toThrow(`Cannot read ${file}`);
  });
});

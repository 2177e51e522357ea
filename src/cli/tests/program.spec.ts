import { describe, expect, it } from 'vitest';

import { createProgram, parseAlternates } from '../index.js';

describe('createProgram', () => {
  it('registers the test and run commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('stepcheck');
    expect(program.commands.map((c) => c.name())).toEqual(['test', 'run']);
  });

  it('takes steps, expectation and alternates on the test command', () => {
    const test = createProgram().commands.find((c) => c.name() === 'test');

    expect(test?.options.map((o) => o.long)).toEqual([
      '--step',
      '--expect',
      '--json',
      '--report-path',
      '--headless',
      '--alternate',
      '--provider',
      '--verbose',
    ]);
  });

  it('defaults the run command to the suite file', () => {
    const run = createProgram().commands.find((c) => c.name() === 'run');

    expect(run?.opts()).toEqual({ config: '.stepcheck.yaml' });
  });
});

describe('parseAlternates', () => {
  it('splits host=url pairs on the first equals sign', () => {
    expect(
      parseAlternates(['flaky.test=https://mirror.test/login', 'slow.test = https://m.test/?q=1']),
    ).toEqual({
      'flaky.test': 'https://mirror.test/login',
      'slow.test': 'https://m.test/?q=1',
    });
  });

  it('rejects a pair without a host', () => {
    expect(() => parseAlternates(['=https://mirror.test'])).toThrow(
      'Invalid alternate "=https://mirror.test" (expected host=url)',
    );
  });
});

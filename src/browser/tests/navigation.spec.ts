import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  NavigationError,
  navigateTo,
  nextNavigationState,
  readTitle,
  retryDelay,
} from '../navigation.js';
import { FakeDriver } from './fakeDriver.js';

beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

const timeout = { type: 'timed-out', reason: 'Timeout 30000ms exceeded' } as const;

describe('nextNavigationState', () => {
  it('finishes on the first successful load', () => {
    expect(nextNavigationState({ kind: 'attempting', attempt: 1 }, { type: 'loaded' })).toEqual({
      kind: 'done',
      strategy: 'network-idle',
    });
  });

  it('retries until the attempt budget is spent, then degrades', () => {
    expect(nextNavigationState({ kind: 'attempting', attempt: 1 }, timeout)).toEqual({
      kind: 'attempting',
      attempt: 2,
    });
    expect(nextNavigationState({ kind: 'attempting', attempt: 3 }, timeout)).toEqual({
      kind: 'degraded',
    });
    expect(nextNavigationState({ kind: 'attempting', attempt: 1 }, timeout, 1)).toEqual({
      kind: 'degraded',
    });
  });

  it('moves from the degraded load to a title probe', () => {
    expect(nextNavigationState({ kind: 'degraded' }, { type: 'loaded' })).toEqual({
      kind: 'done',
      strategy: 'dom-content-loaded',
    });
    expect(nextNavigationState({ kind: 'degraded' }, timeout)).toEqual({ kind: 'probing' });
  });

  it('accepts a partial load only with a non-empty title', () => {
    expect(nextNavigationState({ kind: 'probing' }, { type: 'probed', title: 'Shop' })).toEqual({
      kind: 'done',
      strategy: 'title-probe',
    });
    expect(nextNavigationState({ kind: 'probing' }, { type: 'probed', title: '' })).toEqual({
      kind: 'failed',
    });
  });

  it('keeps terminal states', () => {
    expect(nextNavigationState({ kind: 'failed' }, { type: 'loaded' })).toEqual({ kind: 'failed' });
  });

  it('rejects events that do not belong to the state', () => {
    expect(() => nextNavigationState({ kind: 'probing' }, { type: 'loaded' })).toThrow(
      'Unexpected navigation event "loaded" in state "probing"',
    );
  });
});

describe('retryDelay', () => {
  it('waits only before retries', () => {
    expect([1, 2, 3].map(retryDelay)).toEqual([0, 3000, 3000]);
  });
});

describe('navigateTo', () => {
  it('loads on the first attempt with network idle', async () => {
    const driver = new FakeDriver();
    driver.pageTitle = 'Test Shop';

    const result = await navigateTo(driver, 'https://shop.test');

    expect(result).toEqual({
      success: true,
      title: 'Test Shop',
      strategy: 'network-idle',
      attempts: 1,
    });
    expect(driver.waits).toEqual([]);
    expect(driver.gotos[0]?.options).toEqual({ waitUntil: 'networkidle', timeout: 30000 });
  });

  it('accepts a partial load after every strategy times out', async () => {
    const driver = new FakeDriver();
    driver.gotoPlan = [1, 2, 3, 4].map((n) => new Error(`Timeout ${String(n)}`));
    driver.pageTitle = 'Partial Shop';

    const result = await navigateTo(driver, 'https://slow.test');

    expect(result).toEqual({
      success: true,
      title: 'Partial Shop',
      strategy: 'title-probe',
      attempts: 4,
    });
    expect(driver.waits).toEqual([3000, 3000]);
    expect(driver.gotos.map((g) => g.options.waitUntil)).toEqual([
      'networkidle',
      'networkidle',
      'networkidle',
      'domcontentloaded',
    ]);
  });

  it('falls back to DOM content loaded after the retries', async () => {
    const driver = new FakeDriver();
    driver.gotoPlan = [new Error('t1'), new Error('t2'), new Error('t3')];

    const result = await navigateTo(driver, 'https://slow.test');

    expect(result.strategy).toBe('dom-content-loaded');
    expect(result.attempts).toBe(4);
  });

  it('fails with the last reason when nothing loads and there is no title', async () => {
    const driver = new FakeDriver();
    driver.gotoPlan = [new Error('t1'), new Error('t2'), new Error('t3'), new Error('net down')];
    driver.pageTitle = '';

    const failure = await navigateTo(driver, 'https://down.test').catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(NavigationError);
    expect(failure).toMatchObject({
      message: 'Could not navigate to https://down.test after 4 attempts: net down',
      url: 'https://down.test',
      attempts: 4,
      exitCode: 3,
    });
  });

  it('honours a custom policy', async () => {
    const driver = new FakeDriver();
    driver.gotoPlan = [new Error('t1'), new Error('t2')];

    const result = await navigateTo(driver, 'https://shop.test', {
      maxAttempts: 1,
      timeout: 500,
      retryDelay: () => 10,
    });

    expect(result.attempts).toBe(2);
    expect(result.strategy).toBe('title-probe');
    expect(driver.waits).toEqual([10]);
    expect(driver.gotos.map((g) => g.options.timeout)).toEqual([500, 500]);
  });
});

describe('readTitle', () => {
  it('returns an empty string when the title cannot be read', async () => {
    const driver = new FakeDriver();
    driver.titleError = new Error('Target closed');

    expect(await readTitle(driver)).toBe('');
  });
});

import { describe, expect, it } from 'vitest';

import { decideVerdict, previewContent } from '../results.js';
import { parseTestCase } from '../testCase.js';

describe('decideVerdict', () => {
  it('passes on a direct content match', () => {
    const content = '<html><h1>Example Domain</h1></html>';

    expect(decideVerdict(content, 'https://example.com/', 'Example Domain')).toBe('Pass');
  });

  it('matches case-insensitively against the URL', () => {
    expect(decideVerdict('<p>nothing</p>', 'https://shop.test/ORDER-confirmed', 'order-confirmed')).toBe(
      'Pass',
    );
  });

  it('passes an account expectation on an account-like URL', () => {
    expect(
      decideVerdict('<p>Loading…</p>', 'https://shop.test/account/dashboard', 'My account'),
    ).toBe('Pass');
  });

  it('applies the account rule only to account expectations', () => {
    expect(decideVerdict('<p>Loading…</p>', 'https://shop.test/account', 'Order history')).toBe(
      'Fail',
    );
  });

  it('fails an account expectation on an unrelated URL', () => {
    expect(decideVerdict('<p>Sign in</p>', 'https://shop.test/login', 'My account')).toBe('Fail');
  });

  it('gives the same answer for the same inputs', () => {
    const args = ['<p>Welcome back</p>', 'https://shop.test/', 'welcome'] as const;

    expect(decideVerdict(...args)).toBe(decideVerdict(...args));
  });
});

describe('previewContent', () => {
  it('keeps short content as is', () => {
    expect(previewContent('<p>hi</p>')).toBe('<p>hi</p>');
  });

  it('truncates to 200 characters with an ellipsis', () => {
    const preview = previewContent('x'.repeat(250));

    expect(preview).toBe(`${'x'.repeat(200)}...`);
  });

  it('does not mark content of exactly 200 characters', () => {
    expect(previewContent('y'.repeat(200))).toBe('y'.repeat(200));
  });
});

describe('parseTestCase', () => {
  it('requires at least one step', () => {
    expect(() =>
      parseTestCase({ url: 'https://shop.test', steps: [], expectedOutput: 'x' }),
    ).toThrow();
  });
});

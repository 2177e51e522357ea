// ── Fallback rule tables ──────────────────────────────────────
// Rules are evaluated top to bottom against the lowercased action
// description; the first match contributes its selectors. Order is
// precedence.

export interface FallbackRule {
  readonly name: string;
  readonly when: (description: string) => boolean;
  readonly selectors: readonly string[];
}

export const SIGN_IN_SELECTORS = [
  'text=Sign in',
  'text=Log in',
  "[aria-label='Sign in']",
  'a.account-link',
  '#customer_login_link',
  "//a[contains(text(), 'Sign in')]",
  '.header__action-item-link',
  '.customer-login-link',
  'button.signin-button',
  '.signin',
  '.login-button',
  '#login-button',
] as const;

export const SUBMIT_SELECTORS = [
  "button[type='submit']",
  "input[type='submit']",
  '#signin-button',
  '#customer_login_submit',
  '.btn-signin',
] as const;

export const EMAIL_SELECTORS = [
  "input[type='email']",
  "input[name='email']",
  "input[id*='email' i]",
  '#CustomerEmail',
  'input.customer-email',
  '#email',
  'input.email',
  "[placeholder*='email' i]",
] as const;

export const PASSWORD_SELECTORS = [
  "input[type='password']",
  "input[name='password']",
  "input[id*='password' i]",
  '#CustomerPassword',
  '#password',
  'input.password',
  "[placeholder*='password' i]",
] as const;

/** Icons and buttons that open a hidden login drawer when clicked. */
export const ACCOUNT_TRIGGER_SELECTORS = [
  'button.account-button',
  '.account-trigger',
  '.icon-account',
  '.header__icon--account',
  '.user-icon',
  '.account-icon',
] as const;

export const CLICK_FALLBACKS: readonly FallbackRule[] = [
  {
    name: 'sign-in',
    when: (d) => d.includes('sign in'),
    selectors: SIGN_IN_SELECTORS,
  },
  {
    name: 'submit',
    when: (d) => d.includes('submit') || (d.includes('sign in') && d.includes('button')),
    selectors: SUBMIT_SELECTORS,
  },
];

export const FILL_FALLBACKS: readonly FallbackRule[] = [
  {
    name: 'email',
    when: (d) => d.includes('email'),
    selectors: EMAIL_SELECTORS,
  },
  {
    name: 'password',
    when: (d) => d.includes('password'),
    selectors: PASSWORD_SELECTORS,
  },
];

// ── Chain builder ─────────────────────────────────────────────

/**
 * Explicit selector first, then the first matching rule's list.
 * Duplicates keep their first position.
 */
export function buildSelectorChain(
  primary: string,
  description: string,
  rules: readonly FallbackRule[],
): string[] {
  const lowered = description.toLowerCase();
  const rule = rules.find((r) => r.when(lowered));
  const candidates = [primary, ...(rule?.selectors ?? [])];

  return [...new Set(candidates.filter((s) => s.length > 0))];
}

import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';

// ── Verdict ───────────────────────────────────────────────────

export const verdictSchema = z.enum(['Pass', 'Fail', 'Error']);

export type Verdict = z.infer<typeof verdictSchema>;

// ── RunVerdict ────────────────────────────────────────────────

export const completedRunSchema = z.object({
  result: z.enum(['Pass', 'Fail']),
  expectedOutput: z.string(),
  finalUrl: z.string(),
  stepResults: z.array(z.boolean()),
  contentPreview: z.string(),
});

export const erroredRunSchema = z.object({
  result: z.literal('Error'),
  expectedOutput: z.string(),
  error: z.string(),
});

export const runVerdictSchema = z.discriminatedUnion('result', [
  completedRunSchema,
  erroredRunSchema,
]);

export type CompletedRun = z.infer<typeof completedRunSchema>;
export type ErroredRun = z.infer<typeof erroredRunSchema>;
export type RunVerdict = z.infer<typeof runVerdictSchema>;

// ── Deterministic verdict decision ───────────────────────────
// Account rule: a URL that looks like an account area counts as a
// successful login even if the expected text never rendered.

export const ACCOUNT_INDICATORS = [
  'account',
  'profile',
  'dashboard',
  'my-account',
  'customer',
] as const;

export function decideVerdict(
  content: string,
  url: string,
  expected: string,
): CompletedRun['result'] {
  const needle = expected.toLowerCase();
  const haystackUrl = url.toLowerCase();

  if (content.toLowerCase().includes(needle) || haystackUrl.includes(needle)) {
    return 'Pass';
  }

  if (needle.includes('account')) {
    return ACCOUNT_INDICATORS.some((indicator) => haystackUrl.includes(indicator))
      ? 'Pass'
      : 'Fail';
  }

  return 'Fail';
}

/** Bounded snippet of the final page HTML for reports. */
export function previewContent(content: string): string {
  return content.length > LIMITS.CONTENT_PREVIEW_CHARS
    ? `${content.slice(0, LIMITS.CONTENT_PREVIEW_CHARS)}...`
    : content;
}

import { z } from 'zod';

import { verdictSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Test output ─────────────────────────────────────────────

export const jsonOutputTestSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  result: verdictSchema,
  expectedOutput: z.string(),
  finalUrl: z.string().nullable(),
  stepResults: z.array(z.boolean()),
  contentPreview: z.string().nullable(),
  error: z.string().nullable(),
});

export type JsonOutputTest = z.infer<typeof jsonOutputTestSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  exitCode: z.number().int().nonnegative(),
  aborted: z.boolean(),
  tests: z.array(jsonOutputTestSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;

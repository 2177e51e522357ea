import { z } from 'zod';

import { testCaseSchema } from './testCase.js';
import { DEFAULT_ARTIFACTS_DIR } from '../config/defaults.js';

// ── Suite entry ─────────────────────────────────────────────

export const suiteTestSchema = testCaseSchema.extend({
  name: z.string().min(1),
  // Run instead when the primary site times out.
  fallback: testCaseSchema.optional(),
});

export type SuiteTest = z.infer<typeof suiteTestSchema>;

// ── Full suite file ─────────────────────────────────────────

export const suiteConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  headless: z.boolean().optional().default(true),
  artifactsDir: z.string().min(1).optional().default(DEFAULT_ARTIFACTS_DIR),
  // hostname fragment → alternate URL used when that site is unreachable
  alternateSites: z.record(z.string().min(1), z.string().url()).optional().default({}),
  smokeTest: testCaseSchema.optional(),
  tests: z.array(suiteTestSchema).min(1),
});

export type SuiteConfig = z.infer<typeof suiteConfigSchema>;

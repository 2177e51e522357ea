import { z } from 'zod';

// ── TestCase ──────────────────────────────────────────────────

export const testCaseSchema = z.object({
  url: z.string().url(),
  steps: z.array(z.string().min(1)).min(1),
  expectedOutput: z.string(),
});

export type TestCase = z.infer<typeof testCaseSchema>;

export function parseTestCase(data: unknown): TestCase {
  return testCaseSchema.parse(data);
}

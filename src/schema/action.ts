import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';

// ── Action tag discriminator ──────────────────────────────────

export const actionTypeSchema = z.enum([
  'click',
  'fill',
  'navigate',
  'wait',
  'check',
  'unknown',
]);

export type ActionType = z.infer<typeof actionTypeSchema>;

// ── Individual action schemas ─────────────────────────────────

const description = (fallback: string) => z.string().default(fallback);

export const clickActionSchema = z.object({
  action: z.literal('click'),
  selector: z.string().min(1),
  description: description('click action'),
});

export const fillActionSchema = z.object({
  action: z.literal('fill'),
  selector: z.string().min(1),
  value: z.string().default(''),
  description: description('fill action'),
});

export const navigateActionSchema = z.object({
  action: z.literal('navigate'),
  url: z.string().min(1),
  description: description('navigate action'),
});

/** `time` is in seconds, at most LIMITS.MAX_WAIT_SECONDS. */
export const waitActionSchema = z.object({
  action: z.literal('wait'),
  time: z.coerce.number().finite().nonnegative().max(LIMITS.MAX_WAIT_SECONDS).default(1),
  description: description('wait action'),
});

/** Empty `text` means "view the page" and always succeeds. */
export const checkActionSchema = z.object({
  action: z.literal('check'),
  text: z.string().default(''),
  description: description('check action'),
});

export const unknownActionSchema = z.object({
  action: z.literal('unknown'),
  description: description('unknown action'),
});

// ── Union schema ──────────────────────────────────────────────

export const actionSchema = z.discriminatedUnion('action', [
  clickActionSchema,
  fillActionSchema,
  navigateActionSchema,
  waitActionSchema,
  checkActionSchema,
  unknownActionSchema,
]);

export type Action = z.infer<typeof actionSchema>;

export type ClickAction = z.infer<typeof clickActionSchema>;
export type FillAction = z.infer<typeof fillActionSchema>;
export type NavigateAction = z.infer<typeof navigateActionSchema>;
export type WaitAction = z.infer<typeof waitActionSchema>;
export type CheckAction = z.infer<typeof checkActionSchema>;
export type UnknownAction = z.infer<typeof unknownActionSchema>;

// ── Parser ────────────────────────────────────────────────────

export type ActionParseResult =
  | { ok: true; action: Action }
  | { ok: false; error: string };

/**
 * Validate an already-decoded value as an Action. Never throws.
 */
export function parseAction(data: unknown): ActionParseResult {
  const result = actionSchema.safeParse(fixupRawAction(data));
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }
  return { ok: true, action: result.data };
}

/**
 * Decode JSON text and validate it as an Action. Never throws.
 */
export function parseActionJSON(raw: string): ActionParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }
  return parseAction(parsed);
}

// ── Pre-validation fixups ─────────────────────────────────────
// Models sometimes answer with "type" instead of "action", or with
// an upper-case tag. Normalise before the schema sees it.

function fixupRawAction(data: unknown): unknown {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return data;
  }

  const obj: Record<string, unknown> = { ...data };

  const tag = obj['action'] ?? obj['type'];
  if (typeof tag === 'string') {
    obj['action'] = tag.trim().toLowerCase();
  }

  return obj;
}

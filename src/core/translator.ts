import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from '../llm/index.js';
import type { Action, ActionParseResult } from '../schema/index.js';
import { parseActionJSON } from '../schema/index.js';
import { TRANSLATION } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { describeError } from '../utils/outcome.js';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Heuristic rule table ─────────────────────────────────────
// Used when the model is unavailable or its answer cannot be parsed.
// First matching rule wins.

export interface HeuristicRule {
  readonly name: string;
  readonly matches: (lowered: string) => boolean;
  readonly build: (step: string) => Action;
}

export const HEURISTIC_RULES: readonly HeuristicRule[] = [
  {
    name: 'view',
    matches: (s) => s.includes('view'),
    build: () => ({
      action: 'check',
      text: '',
      description: 'viewing the page content',
    }),
  },
  {
    name: 'sign-in',
    matches: (s) => s.includes('click') && s.includes('sign in'),
    build: () => ({
      action: 'click',
      selector: 'text=Sign in',
      description: 'clicking sign in button',
    }),
  },
  {
    name: 'email',
    matches: (s) => s.includes('enter') && s.includes('email'),
    build: (step) => ({
      action: 'fill',
      selector: "input[type='email']",
      value: quotedValueAfterAs(step) ?? 'test@example.com',
      description: 'entering email',
    }),
  },
  {
    name: 'password',
    matches: (s) => s.includes('enter') && s.includes('password'),
    build: (step) => ({
      action: 'fill',
      selector: "input[type='password']",
      value: quotedValueAfterAs(step) ?? 'test123',
      description: 'entering password',
    }),
  },
];

/** `Enter email as 'a@b.c'` → `a@b.c`. */
export function quotedValueAfterAs(step: string): string | undefined {
  const match = /\bas\s+(["'])(.*?)\1/i.exec(step);
  return match?.[2] || undefined;
}

export function heuristicAction(step: string): Action {
  const lowered = step.toLowerCase();
  const rule = HEURISTIC_RULES.find((r) => r.matches(lowered));
  return rule ? rule.build(step) : { action: 'unknown', description: step };
}

// ── Response parsing ─────────────────────────────────────────

/**
 * Whole response as JSON, then the first brace-delimited object in it.
 */
export function parseModelResponse(raw: string): ActionParseResult {
  const whole = parseActionJSON(raw.trim());
  if (whole.ok) return whole;

  const embedded = /\{[\s\S]*?\}/.exec(raw);
  if (!embedded) return whole;

  return parseActionJSON(embedded[0]);
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Translate one natural-language step into an Action. Total: model or
 * parse failures degrade to the heuristic table.
 */
export async function translateStep(
  client: LLMClient,
  step: string,
  pageContext: string = TRANSLATION.DEFAULT_PAGE_CONTEXT,
): Promise<Action> {
  let raw: string;
  try {
    const systemPrompt = await buildSystemPrompt(pageContext);
    raw = await client.generate(systemPrompt, `Step: "${step}"`, {
      maxTokens: TRANSLATION.MAX_OUTPUT_TOKENS,
      temperature: TRANSLATION.TEMPERATURE,
      stopSequences: [],
    });
  } catch (err) {
    log.warn(`Model call failed, using fallback interpretation: ${describeError(err)}`);
    return heuristicAction(step);
  }

  log.llm(`Interpretation of step '${step}': ${raw.trim()}`);

  const parsed = parseModelResponse(raw);
  if (parsed.ok) return parsed.action;

  log.warn(`Could not parse model response (${parsed.error}). Using fallback interpretation for: ${step}`);
  return heuristicAction(step);
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(pageContext: string): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'translator.txt'),
    'utf-8',
  );

  return template.replace('{{pageContext}}', pageContext);
}

/** `https://www.shop.test/x` → `shop.test website`. */
export function describeSite(url: string): string {
  const match = /https?:\/\/(?:www\.)?([^/]+)/.exec(url);
  return match?.[1] ? `${match[1]} website` : TRANSLATION.DEFAULT_PAGE_CONTEXT;
}

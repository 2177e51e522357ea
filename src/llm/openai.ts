import { z } from 'zod';

import type { GenerateOptions, LLMClient } from './client.js';
import { RateLimitedError, parseRetryAfter, retryOnRateLimit } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Transport ────────────────────────────────────────────────

async function postCompletion(apiKey: string, payload: object): Promise<string> {
  const response = await fetch(COMPLETIONS_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify(payload),
  });

  if (response.status === 429) {
    throw new RateLimitedError('OpenAI', parseRetryAfter(response.headers.get('retry-after')));
  }

  const text = await response.text();
  if (!response.ok) {
    throw new Error(`OpenAI API error (${String(response.status)}): ${text}`);
  }

  const body: unknown = JSON.parse(text);
  return chatResponseSchema.parse(body).choices[0].message.content;
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  return {
    generate(
      systemPrompt: string,
      userPrompt: string,
      options: GenerateOptions = {},
    ): Promise<string> {
      const stop = options.stopSequences ?? [];
      const payload = {
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: options.temperature ?? 0,
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
        ...(stop.length > 0 ? { stop } : {}),
      };

      return retryOnRateLimit(
        () => postCompletion(apiKey, payload),
        (err) => err instanceof RateLimitedError,
      );
    },
  };
}

import Anthropic from '@anthropic-ai/sdk';

import type { GenerateOptions, LLMClient } from './client.js';
import { retryOnRateLimit } from './retry.js';

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';
const DEFAULT_MAX_TOKENS = 1024;

function isRateLimitError(err: unknown): boolean {
  return err instanceof Anthropic.RateLimitError
    || (err instanceof Error && err.message.includes('429'));
}

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options: GenerateOptions = {},
    ): Promise<string> {
      const stopSequences = options.stopSequences ?? [];

      const message = await retryOnRateLimit(
        () =>
          client.messages.create({
            model: resolvedModel,
            max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
            system: systemPrompt,
            messages: [{ role: 'user', content: userPrompt }],
            temperature: options.temperature ?? 0,
            ...(stopSequences.length > 0 ? { stop_sequences: [...stopSequences] } : {}),
          }),
        isRateLimitError,
      );

      const text = message.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (!text) {
        throw new Error('Anthropic API returned no text content');
      }
      return text;
    },
  };
}

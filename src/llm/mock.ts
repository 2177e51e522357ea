import type { GenerateOptions, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"action":"unknown","description":"mock response"}';

// ── Call record ──────────────────────────────────────────────

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
  options: GenerateOptions | undefined;
}

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing and offline runs.
 * Cycles through provided canned responses, falling back to a default.
 * An `Error` entry is thrown instead of returned.
 */
export function createMockClient(
  responses?: readonly (string | Error)[],
): MockLLMClient {
  const calls: MockCall[] = [];

  return {
    calls,

    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ systemPrompt, userPrompt, options });
      if (response instanceof Error) throw response;
      return response;
    },
  };
}

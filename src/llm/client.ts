import { z } from 'zod';

// ── LLMClient interface ──────────────────────────────────────

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  stopSequences?: readonly string[];
}

export interface LLMClient {
  generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export interface LLMOverrides {
  provider?: LLMProvider | undefined;
  model?: string | undefined;
}

/**
 * Provider from overrides, then LLM_PROVIDER, then anthropic. The API key
 * is read for whichever provider wins.
 */
export function loadLLMConfig(
  overrides: LLMOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = overrides.provider ?? env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'openai'
    ? env['OPENAI_API_KEY']
    : env['ANTHROPIC_API_KEY'];

  const envModel = provider === 'openai'
    ? env['LLM_MODEL']
    : env['STEPCHECK_MODEL'];

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: overrides.model ?? (envModel || undefined),
  });
}

// ── Credential precondition ──────────────────────────────────

/**
 * Name of the environment variable the provider needs but lacks,
 * or undefined when the config can create a client.
 */
export function missingCredential(config: LLMConfig): string | undefined {
  if (config.apiKey) return undefined;

  switch (config.provider) {
    case 'anthropic':
      return 'ANTHROPIC_API_KEY';
    case 'openai':
      return 'OPENAI_API_KEY';
    case 'mock':
      return undefined;
  }
}

import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { suiteConfigSchema } from '../schema/config.js';
import type { SuiteConfig } from '../schema/config.js';

// ── Error ───────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.stepcheck.yaml` (or JSON) suite file.
 * Throws a ConfigError if the file is missing, unparsable or invalid.
 */
export async function loadSuiteConfig(configPath: string): Promise<SuiteConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read ${configPath}: ${message}`);
  }

  return parseSuiteConfig(raw, configPath.endsWith('.json') ? 'json' : 'yaml');
}

export function parseSuiteConfig(
  raw: string,
  format: 'json' | 'yaml',
): SuiteConfig {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid ${format.toUpperCase()}: ${message}`);
  }

  const result = suiteConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(result.error.message);
  }

  return result.data;
}

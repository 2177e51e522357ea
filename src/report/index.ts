/**
 * Report generation module.
 * Deterministic — no LLM calls.
 * Transforms verdicts into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputTest } from './reporter.js';

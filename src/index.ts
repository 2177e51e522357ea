/**
 * stepcheck library entry.
 * Natural-language steps → Actions → Playwright → Pass / Fail / Error.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './llm/index.js';
export { generateMarkdown, generateJSON, serializeJSON } from './report/index.js';
export * from './config/index.js';
export { createProgram } from './cli/index.js';

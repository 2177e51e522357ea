import { Command } from 'commander';

import { registerRunCommand, registerTestCommand } from './run.js';

export { prepareClient, parseAlternates } from './run.js';

/** The `stepcheck` program with every command registered; nothing parsed yet. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('stepcheck')
    .description(
      'Natural-language UI test runner. Translate each step with an LLM, execute it with Playwright, decide a verdict.',
    )
    .version('0.1.0');

  registerTestCommand(program);
  registerRunCommand(program);

  return program;
}

/**
 * threadscan CLI - program definition and exit-code mapping
 */

import { Command, CommanderError } from 'commander';
import { version } from '../version.js';
import { registerCoreCommands } from './commands/core.js';
import { EXIT_OK, exitCodeFor, reportError } from './errors.js';

export { EXIT_OK, EXIT_FAILURE, EXIT_INVALID, exitCodeFor, reportError } from './errors.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('threadscan')
    .description('Search and inspect ChatGPT and Claude conversation exports')
    .version(version)
    .option('--provider <name>', 'Export format: auto, chatgpt or claude')
    .exitOverride();

  registerCoreCommands(program);

  return program;
}

/**
 * Parse argv and run the selected command. Resolves to the exit code.
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram();
  process.exitCode = undefined;
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return exitCodeFor(err);
    }
    reportError(err);
  }
  // Commands record failures on process.exitCode; hand it to the caller instead
  const code = typeof process.exitCode === 'number' ? process.exitCode : EXIT_OK;
  process.exitCode = undefined;
  return code;
}

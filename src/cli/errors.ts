/**
 * Exit codes and error output for the CLI
 */

import { CommanderError } from 'commander';
import { ConfigError } from '../config/index.js';
import { ThreadscanError, ValidationError } from '../errors/index.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID = 2;

/**
 * Invalid queries, arguments and configuration exit with 2; everything
 * else (missing file, access, decoding, unsupported format) with 1
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ValidationError || err instanceof ConfigError) return EXIT_INVALID;
  if (err instanceof CommanderError) return err.exitCode === EXIT_OK ? EXIT_OK : EXIT_INVALID;
  return EXIT_FAILURE;
}

/**
 * Print an error and record the matching exit code
 */
export function reportError(err: unknown): void {
  if (err instanceof ThreadscanError || err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
  } else if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
    if (err.stack) console.error(err.stack);
  } else {
    console.error('Error:', err);
  }
  process.exitCode = exitCodeFor(err);
}

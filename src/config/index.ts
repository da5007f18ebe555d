/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * Configuration schema with zod validation
 * All options have defaults
 */
export const ConfigSchema = z.object({
  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),

  // Ingestion Configuration
  provider: z
    .enum(['auto', 'chatgpt', 'claude'])
    .default('auto')
    .describe('Export format to assume, or auto-detect from the first record'),
  progressEvery: z
    .coerce
    .number()
    .int()
    .min(1)
    .default(100)
    .describe('Items processed between progress reports'),
  progressIntervalMs: z
    .coerce
    .number()
    .int()
    .min(0)
    .default(2000)
    .describe('Milliseconds between progress reports'),

  // Search Configuration
  snippetLength: z
    .coerce
    .number()
    .int()
    .min(20)
    .max(1000)
    .default(100)
    .describe('Maximum snippet length in characters'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with the offending zod issues attached
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    logLevel: process.env.THREADSCAN_LOG_LEVEL,
    logFormat: process.env.THREADSCAN_LOG_FORMAT,
    provider: process.env.THREADSCAN_PROVIDER,
    progressEvery: process.env.THREADSCAN_PROGRESS_EVERY,
    progressIntervalMs: process.env.THREADSCAN_PROGRESS_INTERVAL_MS,
    snippetLength: process.env.THREADSCAN_SNIPPET_LENGTH,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const result = ConfigSchema.safeParse(buildRawConfig());

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

let _config: Config | null = null;

/**
 * Get the global configuration instance
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 */
export function setConfig(config: unknown): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}

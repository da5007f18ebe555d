/**
 * Config module tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  ConfigSchema,
  ConfigError,
  loadConfig,
  validateConfig,
  getDefaultConfig,
  getConfig,
  setConfig,
  resetConfig,
} from './index.js';

describe('ConfigSchema', () => {
  it('should parse empty config with defaults', () => {
    const config = ConfigSchema.parse({});

    expect(config).toEqual({
      logLevel: 'info',
      logFormat: 'pretty',
      provider: 'auto',
      progressEvery: 100,
      progressIntervalMs: 2000,
      snippetLength: 100,
    });
  });

  it('should coerce string numbers to numbers', () => {
    const config = ConfigSchema.parse({ progressEvery: '25', snippetLength: '200' });

    expect(config.progressEvery).toBe(25);
    expect(config.snippetLength).toBe(200);
  });

  it('should reject out-of-range values', () => {
    expect(ConfigSchema.safeParse({ progressEvery: 0 }).success).toBe(false);
    expect(ConfigSchema.safeParse({ snippetLength: 5 }).success).toBe(false);
    expect(ConfigSchema.safeParse({ provider: 'gemini' }).success).toBe(false);
  });
});

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read THREADSCAN_ environment variables', () => {
    vi.stubEnv('THREADSCAN_PROVIDER', 'claude');
    vi.stubEnv('THREADSCAN_PROGRESS_EVERY', '10');
    vi.stubEnv('THREADSCAN_LOG_LEVEL', 'debug');

    const config = loadConfig();

    expect(config.provider).toBe('claude');
    expect(config.progressEvery).toBe(10);
    expect(config.logLevel).toBe('debug');
  });

  it('should throw ConfigError for invalid values', () => {
    vi.stubEnv('THREADSCAN_SNIPPET_LENGTH', 'lots');

    expect(() => loadConfig()).toThrow(ConfigError);
    expect(() => loadConfig()).toThrow(/snippetLength/);
  });
});

describe('validateConfig', () => {
  it('should fill defaults for a partial config', () => {
    expect(validateConfig({ logFormat: 'json' }).logFormat).toBe('json');
    expect(validateConfig({ logFormat: 'json' }).provider).toBe('auto');
  });

  it('should attach zod issues to the error', () => {
    try {
      validateConfig({ logLevel: 'loud' });
      expect.unreachable('validateConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({ issues: [expect.objectContaining({ path: ['logLevel'] })] });
    }
  });
});

describe('global config', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should return the config set with setConfig', () => {
    setConfig({ provider: 'chatgpt', snippetLength: 300 });

    expect(getConfig().provider).toBe('chatgpt');
    expect(getConfig().snippetLength).toBe(300);
  });

  it('should reload after resetConfig', () => {
    setConfig({ provider: 'chatgpt' });
    resetConfig();

    expect(getConfig()).toEqual(loadConfig());
  });

  it('should expose defaults', () => {
    expect(getDefaultConfig().progressIntervalMs).toBe(2000);
  });
});

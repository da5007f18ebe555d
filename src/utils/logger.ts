/**
 * Logger utility using pino
 * Logs go to stderr so command output on stdout stays parseable
 */

import pino from 'pino';
import { getConfig } from '../config/index.js';

let _logger: pino.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    const config = getConfig();

    if (config.logFormat === 'pretty' && config.logLevel !== 'silent') {
      _logger = pino({
        level: config.logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            destination: 2,
          },
        },
      });
    } else {
      _logger = pino({ level: config.logLevel }, pino.destination(2));
    }
  }
  return _logger;
}

/**
 * Create a child logger with context
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

/**
 * Drop the cached logger so the next call picks up a changed config
 */
export function resetLogger(): void {
  _logger = null;
}

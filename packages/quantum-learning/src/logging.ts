/**
 * Logging
 *
 * Named loglevel loggers, one per module, with a `[qclearn:<module>]`
 * prefix. The threshold comes from QCLEARN_LOG_LEVEL (default: warn).
 *
 * @module logging
 */

import log from 'loglevel';

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly LogLevelName[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_LOG_LEVEL: LogLevelName = 'warn';

/**
 * Map an environment value onto a level name; unknown values fall back to the default.
 */
export function resolveLogLevel(value: string | undefined): LogLevelName {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? DEFAULT_LOG_LEVEL;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger for a specific module.
 */
export function createLogger(module: string): Logger {
  const name = `qclearn:${module}`;
  const logger = log.getLogger(name);
  logger.setLevel(resolveLogLevel(process.env.QCLEARN_LOG_LEVEL), false);
  const prefix = `[${name}]`;

  return {
    debug: (message) => logger.debug(`${prefix} ${message}`),
    info: (message) => logger.info(`${prefix} ${message}`),
    warn: (message) => logger.warn(`${prefix} ${message}`),
    error: (message) => logger.error(`${prefix} ${message}`),
  };
}

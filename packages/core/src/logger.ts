/**
 * @module logger
 * Console-backed scoped logger.
 *
 * Lines look like `[svgview:watch] WARN watch error: ...` and all go to
 * standard error so that standard output stays free for the usage message.
 */

import type { LogLevel, Logger } from '@svgview/types';

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/** Check that a string names a known log level. */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Create a logger for one subsystem.
 * @param scope - Short subsystem name shown in the prefix.
 * @param level - Most verbose level that is still written.
 */
export function createLogger(scope: string, level: LogLevel = 'warn'): Logger {
  const prefix = `[svgview:${scope}]`;
  const write = (messageLevel: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[messageLevel] > LEVEL_RANK[level]) return;
    // eslint-disable-next-line no-console
    console.error(`${prefix} ${messageLevel.toUpperCase()} ${message}`, ...details);
  };

  return {
    error: (message, ...details) => write('error', message, details),
    warn: (message, ...details) => write('warn', message, details),
    info: (message, ...details) => write('info', message, details),
    debug: (message, ...details) => write('debug', message, details),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

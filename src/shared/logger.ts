// ============================================================
// Doc Analyzer - Console Logger
// Leveled console output with a scope tag per module
// ============================================================

import type { LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PREFIX = '[Doc Analyzer]';

let minLevel: LogLevel = 'info';

/** Sets the minimum level emitted by every logger. */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Creates a logger whose lines read `[Doc Analyzer] [scope] message`.
 * A fixed `level` overrides the process-wide minimum for this logger.
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const tag = `${PREFIX} [${scope}]`;
  const shouldLog = (candidate: LogLevel) =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level ?? minLevel];

  return {
    debug(message, ...args) {
      if (shouldLog('debug')) console.debug(`${tag} ${message}`, ...args);
    },
    info(message, ...args) {
      if (shouldLog('info')) console.log(`${tag} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (shouldLog('warn')) console.warn(`${tag} ${message}`, ...args);
    },
    error(message, ...args) {
      if (shouldLog('error')) console.error(`${tag} ${message}`, ...args);
    },
  };
}

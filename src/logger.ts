/**
 * Console Logger - level-filtered console output with a component prefix.
 *
 * The threshold is process-wide: the entry point sets it once from
 * `LOG_LEVEL`, and every logger created before or after honours it.
 */

import type { LogLevel } from './config.js';

/** Numeric log level for comparison */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: number = LOG_LEVEL_ORDER.info;

export function setLogLevel(level: LogLevel): void {
  minLevel = LOG_LEVEL_ORDER[level];
}

export function isLevelEnabled(level: LogLevel): boolean {
  return minLevel <= LOG_LEVEL_ORDER[level];
}

export class ConsoleLogger {
  constructor(private readonly prefix: string) {}

  debug(message: string, ...details: unknown[]): void {
    if (isLevelEnabled('debug')) {
      console.debug(`[${this.prefix}] ${message}`, ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (isLevelEnabled('info')) {
      console.log(`[${this.prefix}] ${message}`, ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (isLevelEnabled('warn')) {
      console.warn(`[${this.prefix}] ${message}`, ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (isLevelEnabled('error')) {
      console.error(`[${this.prefix}] ${message}`, ...details);
    }
  }
}

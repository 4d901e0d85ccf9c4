import { LogLevel } from '@nestjs/common';

const DEFAULT_TRUNCATE_LENGTH = 100;

// NestJS log levels, most to least severe
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Shorten a value for log lines
 * Literals are logged as written; other values as JSON
 */
export function truncateForLog(data: unknown, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  const str = typeof data === 'string' ? data : JSON.stringify(data) ?? String(data);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + '...';
}

function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(candidate => candidate === level);
}

/**
 * Enabled log levels for a LOG_LEVEL value, matched without regard to case.
 * NestJS levels are cumulative, so 'debug' includes error, warn, log, and debug.
 */
export function getLogLevels(minLevel: string = 'log'): LogLevel[] {
  const level = minLevel.trim().toLowerCase();
  if (!isLogLevel(level)) {
    return ['error', 'warn', 'log'];
  }
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

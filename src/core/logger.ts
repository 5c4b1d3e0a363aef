/**
 * Shared pino logger.
 *
 * LOG_LEVEL wins over the configured level so tests and scripts can
 * silence output without touching config files.
 */

import { pino, type Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env['LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

export const logger: Logger = pino({
  name: 'crate-graph',
  level: initialLevel(),
});

const children: Logger[] = [];

/**
 * Child logger tagged with a component name.
 */
export function createLogger(component: string): Logger {
  const child = logger.child({ component });
  children.push(child);
  return child;
}

/**
 * Apply a configured level unless LOG_LEVEL overrides it.
 */
export function setLogLevel(level: LogLevel): void {
  if (isLogLevel(process.env['LOG_LEVEL'])) {
    return;
  }
  logger.level = level;
  // pino children copy the level at creation time
  for (const child of children) {
    child.level = level;
  }
}

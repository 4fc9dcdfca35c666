/**
 * Console-backed logger with level filtering
 *
 * The level comes from the graph configuration, or from the
 * KNOWLEDGE_GRAPH_LOG_LEVEL environment variable when none is given.
 */

import type { LogLevel } from '../core/types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LEVEL_PREFIX: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '🚨'
};

export type LogMeta = Record<string, unknown>;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

/**
 * Resolve the effective level: explicit value, then environment, then 'warn'
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const fromEnv = process.env.KNOWLEDGE_GRAPH_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

export class Logger {
  private readonly scope: string;
  private readonly level: LogLevel;

  constructor(scope: string, level?: LogLevel) {
    this.scope = scope;
    this.level = resolveLogLevel(level);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = `${LEVEL_PREFIX[level]} [${this.scope}] ${message}`;
    const args: unknown[] = meta ? [line, meta] : [line];

    switch (level) {
      case 'error':
        console.error(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'debug':
        console.debug(...args);
        break;
      default:
        console.log(...args);
    }
  }
}

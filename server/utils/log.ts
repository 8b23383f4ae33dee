/**
 * サーバーログ（console ベース）。LOG_LEVEL 未満は no-op
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(...args: unknown[]) {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
    info(...args: unknown[]) {
      if (enabled('info')) console.log(prefix, ...args);
    },
    warn(...args: unknown[]) {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error(...args: unknown[]) {
      if (enabled('error')) console.error(prefix, ...args);
    },
  };
}

// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Derive a logger that prefixes every line with a component scope. */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = scope
      ? `[${timestamp}] ${msgLevel.toUpperCase()} [${scope}]:`
      : `[${timestamp}] ${msgLevel.toUpperCase()}:`;
    const sink = msgLevel === 'debug' ? 'log' : msgLevel;
    if (args.length > 0) {
      console[sink](prefix, message, ...args);
    } else {
      console[sink](prefix, message);
    }
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}

/** Logger that drops everything. Handy as a default in tests. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

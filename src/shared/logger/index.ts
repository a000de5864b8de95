/**
 * Scoped console logger.
 *
 * Every line is prefixed with the scope name. Debug output is off unless
 * enabled with `setLogLevel('debug')`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function emit(
  sink: (...args: unknown[]) => void,
  scope: string,
  message: string,
  context: LogContext | undefined,
): void {
  if (context === undefined) {
    sink(`[${scope}] ${message}`);
  } else {
    sink(`[${scope}] ${message}`, context);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug(message, context) {
      if (enabled('debug')) emit(console.debug, scope, message, context);
    },
    info(message, context) {
      if (enabled('info')) emit(console.info, scope, message, context);
    },
    warn(message, context) {
      if (enabled('warn')) emit(console.warn, scope, message, context);
    },
    error(message, context) {
      if (enabled('error')) emit(console.error, scope, message, context);
    },
  };
}

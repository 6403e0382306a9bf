import { formatError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string, error?: unknown) => void;
  error: (message: string, error?: unknown) => void;
}

function enabled(level: LogLevel) {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Console logger that prefixes every line with `[scope]`.
 * Errors passed as the second argument are flattened with formatError.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const withError = (message: string, error?: unknown) =>
    error === undefined ? `${prefix} ${message}` : `${prefix} ${message}: ${formatError(error)}`;

  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled('info')) console.log(`${prefix} ${message}`);
    },
    warn: (message, error) => {
      if (enabled('warn')) console.warn(withError(message, error));
    },
    error: (message, error) => {
      if (enabled('error')) console.error(withError(message, error));
    },
  };
}

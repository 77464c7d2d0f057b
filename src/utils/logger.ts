// Simple logging utility to control console output
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

// Read on every call so tests and embedding processes can change it at runtime
const activeLevel = (): LogLevel => {
  if (process.env.DEBUG_LOGS === 'true') {
    return 'debug';
  }
  const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
};

export const isLevelEnabled = (level: Exclude<LogLevel, 'silent'>): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel()];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export const logger: Logger = {
  debug: (...args: unknown[]) => {
    if (isLevelEnabled('debug')) {
      console.log(...args);
    }
  },
  info: (...args: unknown[]) => {
    if (isLevelEnabled('info')) {
      console.info(...args);
    }
  },
  warn: (...args: unknown[]) => {
    if (isLevelEnabled('warn')) {
      console.warn(...args);
    }
  },
  error: (...args: unknown[]) => {
    if (isLevelEnabled('error')) {
      console.error(...args);
    }
  }
};

/**
 * Returns a logger that prefixes every message with `[tag]`.
 */
export const createLogger = (tag: string): Logger => ({
  debug: (...args: unknown[]) => logger.debug(`[${tag}]`, ...args),
  info: (...args: unknown[]) => logger.info(`[${tag}]`, ...args),
  warn: (...args: unknown[]) => logger.warn(`[${tag}]`, ...args),
  error: (...args: unknown[]) => logger.error(`[${tag}]`, ...args)
});

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.SITEMAP_TREE_LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[currentLevel];
}

/**
 * Console logger with a `[scope]` prefix, writing to stderr at every level so
 * stdout carries only reports. The level is read on every call so
 * `setLogLevel` affects loggers created before it.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled('debug')) console.error(chalk.gray(`${prefix} ${message}`));
    },
    info(message) {
      if (enabled('info')) console.error(`${chalk.blue(prefix)} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(chalk.yellow(`${prefix} ${message}`));
    },
    error(message) {
      if (enabled('error')) console.error(chalk.red(`${prefix} ${message}`));
    },
  };
}

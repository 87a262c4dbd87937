/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * JSON output in production, pino-pretty in development.
 */

import pino, { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;
const children: Logger[] = [];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) return envLevel;
  // node --test sets NODE_TEST_CONTEXT in the processes running test files
  return process.env.NODE_TEST_CONTEXT !== undefined ? 'silent' : 'info';
}

/**
 * Initialize the root logger. Module loggers are created at import time,
 * so a second call (e.g. after the config file is read) keeps the output
 * stream and only moves every logger to the new level.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? defaultLevel();

  if (rootLogger) {
    rootLogger.level = level;
    for (const child of children) child.level = level;
    return rootLogger;
  }

  const underTest = process.env.NODE_TEST_CONTEXT !== undefined;
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && !underTest);

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level });
  }
  return rootLogger;
}

/** Root logger, initialized on first use */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  const child = getRootLogger().child({ module });
  children.push(child);
  return child;
}

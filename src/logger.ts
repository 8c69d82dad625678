/**
 * Logging
 * winston service loggers for the compiler, include_file and the CLI
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export type ServiceName = 'compiler' | 'include' | 'cli';

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

const consoleFormat = winston.format.printf(({ level, message, service }) => {
  const label = level.charAt(0).toUpperCase() + level.slice(1);
  if (process.env['MANIFOLD_DEBUG'] === 'true') {
    return `${label}: [${String(service)}] ${String(message)}`;
  }
  return `${label}: ${String(message)}`;
});

/**
 * Effective level: MANIFOLD_LOG_LEVEL wins, then MANIFOLD_DEBUG=true,
 * then the configured level.
 */
export function resolveLogLevel(configured?: LogLevel): LogLevel {
  const fromEnv = process.env['MANIFOLD_LOG_LEVEL'];
  if (isLogLevel(fromEnv)) return fromEnv;
  if (process.env['MANIFOLD_DEBUG'] === 'true') return 'debug';
  return configured ?? DEFAULT_LOG_LEVEL;
}

/**
 * Create a service logger. An explicit level is used as given; without
 * one the level comes from `resolveLogLevel()`. Output goes to stderr so
 * stdout stays free for the compiled catalog, and the console transport
 * is silent under tests.
 */
export function createLogger(
  service: ServiceName,
  level?: LogLevel
): winston.Logger {
  return winston.createLogger({
    level: level ?? resolveLogLevel(),
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: [...LOG_LEVELS],
        silent: process.env['NODE_ENV'] === 'test',
      }),
    ],
  });
}

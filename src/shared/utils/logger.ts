/**
 * Structured JSON logger for the patch scheduler tools.
 *
 * Uses Pino for JSON logging that CloudWatch and log shippers can ingest as-is.
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Level names accepted from the command line or LOG_LEVEL, mapped to Pino levels.
 */
const LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  trace: 'trace',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'fatal',
  critical: 'fatal',
  silent: 'silent',
};

/**
 * Normalize a user-supplied level name (e.g. "WARNING", "critical").
 *
 * @returns The Pino level, or undefined when the name is not recognized
 */
export function normalizeLogLevel(level: string | undefined): LogLevel | undefined {
  if (!level) {
    return undefined;
  }
  const key = level.toLowerCase();
  return Object.hasOwn(LEVEL_ALIASES, key) ? LEVEL_ALIASES[key] : undefined;
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @param destination - Optional output stream (stdout when omitted)
 * @returns Configured Pino logger
 */
export function setupLogger(
  name: string = 'patch-scheduler',
  level?: string,
  destination?: pino.DestinationStream
): pino.Logger {
  const logLevel: LogLevel =
    normalizeLogLevel(level) ?? normalizeLogLevel(process.env.LOG_LEVEL) ?? 'info';

  const options: pino.LoggerOptions = {
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}

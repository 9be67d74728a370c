/**
 * Command-line plumbing shared by both tools: argument parsing, list
 * splitting and the mapping of errors to exit codes.
 */

import type { ParseArgsConfig } from 'util';
import type { Logger } from 'pino';
import {
  AuthResolutionError,
  ConfigurationError,
  LoadError,
  RemoteOperationError,
  describeError,
} from '@shared/errors';
import { normalizeLogLevel } from '@shared/utils/logger';

export const ExitCode = {
  Success: 0,
  /** At least one remote operation failed, or the run was cancelled. */
  OperationFailed: 1,
  InvalidInput: 2,
  AuthFailed: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Options every tool accepts.
 */
export const COMMON_OPTIONS = {
  region: { type: 'string', short: 'r' },
  profile: { type: 'string', short: 'p' },
  'log-level': { type: 'string', short: 'l' },
  help: { type: 'boolean', short: 'h' },
} as const satisfies ParseArgsConfig['options'];

/**
 * Rethrow an argument parser failure as a configuration error.
 */
export function toConfigurationError(error: unknown): ConfigurationError {
  const message = error instanceof Error ? error.message : String(error);
  return new ConfigurationError(message, { cause: error });
}

/**
 * Flatten repeated and comma-separated values: ["1,2", "3"] -> ["1", "2", "3"].
 */
export function splitList(values: readonly string[] | undefined): string[] | undefined {
  if (values === undefined) {
    return undefined;
  }
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Validate a --log-level value.
 *
 * @throws {ConfigurationError} If the level is not recognized
 */
export function parseLogLevel(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const level = normalizeLogLevel(value);
  if (!level) {
    throw new ConfigurationError(
      `Invalid log level '${value}'. Valid levels: DEBUG, INFO, WARNING, ERROR, CRITICAL`
    );
  }
  return level;
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError || error instanceof LoadError) {
    return ExitCode.InvalidInput;
  }
  if (error instanceof AuthResolutionError) {
    return ExitCode.AuthFailed;
  }
  return ExitCode.OperationFailed;
}

/**
 * Log a fatal error and return the matching exit code.
 */
export function reportFatal(logger: Logger, error: unknown): ExitCode {
  const context: Record<string, unknown> = {
    errorType: error instanceof Error ? error.name : typeof error,
    error: describeError(error),
  };
  if (error instanceof RemoteOperationError) {
    context.action = error.action;
    context.resourceType = error.resourceType;
    context.resourceId = error.resourceId;
    context.error = describeError(error.cause);
  }
  logger.error(context, 'Run aborted');
  return exitCodeFor(error);
}

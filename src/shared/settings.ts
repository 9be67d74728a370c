/**
 * Policy settings read from `PATCH_*` environment variables.
 *
 * Window duration, cutoff, task rate limits and call concurrency are fixed
 * defaults that can be overridden through the environment. Both tools bound
 * their remote calls by `PATCH_EXECUTION_CONCURRENCY`.
 */

import { z } from 'zod';
import type { ProvisionSettings } from '@shared/types';
import { ConfigurationError } from '@shared/errors';

/**
 * MaxConcurrency / MaxErrors: an absolute count or a percentage.
 */
const RATE_PATTERN = /^([1-9][0-9]*|[1-9][0-9]%|[1-9]%|100%)$/;

const ExecutionConcurrency = z.coerce.number().int().min(1).max(32).default(4);

const SettingsSchema = z
  .object({
    PATCH_WINDOW_DURATION_HOURS: z.coerce.number().int().min(1).max(24).default(3),
    PATCH_WINDOW_CUTOFF_HOURS: z.coerce.number().int().min(0).max(23).default(1),
    PATCH_WINDOW_NAME_PREFIX: z
      .string()
      .regex(/^[a-zA-Z0-9_.-]{1,64}$/, 'letters, digits, "_", "-" and "." only')
      .default('patching'),
    PATCH_TASK_MAX_CONCURRENCY: z.string().regex(RATE_PATTERN).default('10%'),
    PATCH_TASK_MAX_ERRORS: z.string().regex(RATE_PATTERN).default('10%'),
    PATCH_OPERATION: z.enum(['Install', 'Scan']).default('Install'),
    PATCH_EXECUTION_CONCURRENCY: ExecutionConcurrency,
  })
  .refine((s) => s.PATCH_WINDOW_CUTOFF_HOURS < s.PATCH_WINDOW_DURATION_HOURS, {
    message: 'cutoff must be shorter than the window duration',
    path: ['PATCH_WINDOW_CUTOFF_HOURS'],
  });

const ExecutionSchema = z.object({ PATCH_EXECUTION_CONCURRENCY: ExecutionConcurrency });

type Environment = Record<string, string | undefined>;

function patchVariables(env: Environment): Record<string, string | undefined> {
  // Empty variables count as unset
  return Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('PATCH_') && value !== '')
  );
}

function settingsError(label: string, error: z.ZodError): ConfigurationError {
  const issues = error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return new ConfigurationError(`Invalid ${label} settings: ${issues.join('; ')}`, {
    cause: error,
  });
}

/**
 * Read provisioning settings from the environment.
 *
 * @throws {ConfigurationError} If any override is invalid
 */
export function loadProvisionSettings(env: Environment = process.env): ProvisionSettings {
  const parsed = SettingsSchema.safeParse(patchVariables(env));
  if (!parsed.success) {
    throw settingsError('provisioning', parsed.error);
  }

  const s = parsed.data;
  return {
    windowDurationHours: s.PATCH_WINDOW_DURATION_HOURS,
    windowCutoffHours: s.PATCH_WINDOW_CUTOFF_HOURS,
    windowNamePrefix: s.PATCH_WINDOW_NAME_PREFIX,
    taskMaxConcurrency: s.PATCH_TASK_MAX_CONCURRENCY,
    taskMaxErrors: s.PATCH_TASK_MAX_ERRORS,
    patchOperation: s.PATCH_OPERATION,
    executionConcurrency: s.PATCH_EXECUTION_CONCURRENCY,
  };
}

/**
 * Read only the remote-call concurrency, ignoring the provisioning overrides.
 *
 * @throws {ConfigurationError} If `PATCH_EXECUTION_CONCURRENCY` is invalid
 */
export function loadExecutionConcurrency(env: Environment = process.env): number {
  const parsed = ExecutionSchema.safeParse(patchVariables(env));
  if (!parsed.success) {
    throw settingsError('execution', parsed.error);
  }
  return parsed.data.PATCH_EXECUTION_CONCURRENCY;
}

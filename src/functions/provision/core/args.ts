/**
 * Command-line arguments of the provisioning tool.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import type { Weekday } from '@shared/types';
import { ConfigurationError } from '@shared/errors';
import { COMMON_OPTIONS, parseLogLevel, splitList, toConfigurationError } from '@shared/cli';
import { parseWeekday } from './schedule';

export const DEFAULT_WEEKS = ['1', '2'];
export const DEFAULT_WEEKDAYS = ['TUE', 'WED'];
export const DEFAULT_HOURS = ['3', '4'];
export const DEFAULT_BASELINE_FILE = 'baseline.yaml';

const OPTIONS = {
  ...COMMON_OPTIONS,
  weeks: { type: 'string', short: 'w', multiple: true },
  days: { type: 'string', short: 'd', multiple: true },
  hours: { type: 'string', short: 'H', multiple: true },
  timezone: { type: 'string', short: 't' },
  'baseline-file': { type: 'string', short: 'b' },
} as const;

export const USAGE = `Usage: provision [options]

Create SSM patch baseline, maintenance windows and patching tasks.

Options:
  -w, --weeks <list>          Week(s) of the month, 1-5 (default: ${DEFAULT_WEEKS.join(',')})
  -d, --days <list>           Weekday(s), e.g. TUE or tuesday (default: ${DEFAULT_WEEKDAYS.join(',')})
  -H, --hours <list>          Start hour(s), 0-23 (default: ${DEFAULT_HOURS.join(',')})
  -t, --timezone <zone>       IANA timezone of the windows (default: UTC)
  -b, --baseline-file <path>  Baseline descriptor (default: ${DEFAULT_BASELINE_FILE})
  -r, --region <region>       AWS region (default: from the environment or config)
  -p, --profile <name>        AWS SSO profile
  -l, --log-level <level>     DEBUG, INFO, WARNING, ERROR or CRITICAL
  -h, --help                  Show this help

Lists may be comma-separated or given by repeating the option.
`;

export interface ProvisionArgs {
  weeks: number[];
  weekdays: Weekday[];
  hours: number[];
  timezone?: string;
  baselineFile: string;
  region?: string;
  profile?: string;
  logLevel?: string;
  help: boolean;
}

const NumberListSchema = z.array(z.coerce.number().int());

function parseNumbers(values: string[], label: string): number[] {
  const parsed = NumberListSchema.safeParse(values);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label}: ${values.join(',')} (whole numbers expected)`);
  }
  return parsed.data;
}

function readOptions(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS }).values;
  } catch (error) {
    throw toConfigurationError(error);
  }
}

/**
 * Parse and validate the provisioning tool's arguments.
 *
 * Ranges and emptiness are checked by the schedule expander.
 *
 * @throws {ConfigurationError} On unknown options or malformed values
 */
export function parseProvisionArgs(argv: string[]): ProvisionArgs {
  const values = readOptions(argv);

  return {
    weeks: parseNumbers(splitList(values.weeks) ?? DEFAULT_WEEKS, 'weeks'),
    weekdays: (splitList(values.days) ?? DEFAULT_WEEKDAYS).map(parseWeekday),
    hours: parseNumbers(splitList(values.hours) ?? DEFAULT_HOURS, 'hours'),
    timezone: values.timezone,
    baselineFile: values['baseline-file'] ?? DEFAULT_BASELINE_FILE,
    region: values.region,
    profile: values.profile,
    logLevel: parseLogLevel(values['log-level']),
    help: values.help ?? false,
  };
}

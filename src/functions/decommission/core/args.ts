/**
 * Command-line arguments of the decommissioning tool.
 */

import { parseArgs } from 'util';
import { COMMON_OPTIONS, parseLogLevel, toConfigurationError } from '@shared/cli';

export const USAGE = `Usage: decommission [options]

Delete SSM patching resources: maintenance windows holding only patching
tasks (or no tasks), patch-group registrations and custom patch baselines.
Windows with any other task are left untouched.

Options:
  -r, --region <region>     AWS region (default: from the environment or config)
  -p, --profile <name>      AWS SSO profile
  -l, --log-level <level>   DEBUG, INFO, WARNING, ERROR or CRITICAL
  -h, --help                Show this help
`;

export interface DecommissionArgs {
  region?: string;
  profile?: string;
  logLevel?: string;
  help: boolean;
}

function readOptions(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: COMMON_OPTIONS }).values;
  } catch (error) {
    throw toConfigurationError(error);
  }
}

/**
 * @throws {ConfigurationError} On unknown options or an invalid log level
 */
export function parseDecommissionArgs(argv: string[]): DecommissionArgs {
  const values = readOptions(argv);

  return {
    region: values.region,
    profile: values.profile,
    logLevel: parseLogLevel(values['log-level']),
    help: values.help ?? false,
  };
}

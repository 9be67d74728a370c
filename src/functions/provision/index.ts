/**
 * Entry point of the provisioning tool.
 *
 * Validates every input before the first remote call, then creates the patch
 * baseline, its patch-group registration and one maintenance window per
 * expanded schedule.
 */

import { PatchControlPlane } from '@shared/aws/controlPlane';
import { credentialsForProfile, resolveRegion, verifyCredentials } from '@shared/aws/region';
import { ExitCode, reportFatal } from '@shared/cli';
import { loadProvisionSettings } from '@shared/settings';
import { setupLogger } from '@shared/utils/logger';
import { parseProvisionArgs, USAGE } from './core/args';
import { loadBaselineDescriptor } from './core/baseline';
import { Provisioner } from './core/provisioner';
import { expand } from './core/schedule';

export interface MainOptions {
  /** Abort to stop dispatching new remote calls. */
  signal?: AbortSignal;
  env?: Record<string, string | undefined>;
}

/**
 * Run the provisioning tool.
 *
 * @param argv - Arguments without the node and script paths
 * @returns Process exit code
 *
 * @example
 * await main(['--weeks', '1,2', '--days', 'TUE,WED', '--hours', '3,4', '--timezone', 'Europe/London']);
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  let logger = setupLogger('patch-scheduler:provision');

  try {
    const args = parseProvisionArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return ExitCode.Success;
    }
    logger = setupLogger('patch-scheduler:provision', args.logLevel);

    const settings = loadProvisionSettings(options.env ?? process.env);
    const specs = expand({
      weeks: args.weeks,
      weekdays: args.weekdays,
      hours: args.hours,
      timezone: args.timezone,
    });
    const baseline = await loadBaselineDescriptor(args.baselineFile, args.logLevel);

    logger.info(
      {
        windows: specs.length,
        weeks: args.weeks,
        weekdays: args.weekdays,
        hours: args.hours,
        timezone: args.timezone ?? 'UTC',
      },
      'Schedule expanded'
    );

    const credentials = credentialsForProfile(args.profile);
    const region = await resolveRegion({
      override: args.region,
      profile: args.profile,
      credentials,
      logLevel: args.logLevel,
    });
    const identity = await verifyCredentials(region, credentials);
    logger.info({ region, account: identity.account, arn: identity.arn }, 'Credentials verified');

    const provisioner = new Provisioner(new PatchControlPlane({ region, credentials }), {
      settings,
      logLevel: args.logLevel,
      signal: options.signal,
    });
    const report = await provisioner.provision(specs, baseline);

    return report.failed > 0 || report.cancelled ? ExitCode.OperationFailed : ExitCode.Success;
  } catch (error) {
    return reportFatal(logger, error);
  }
}

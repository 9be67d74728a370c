/**
 * Entry point of the decommissioning tool.
 *
 * Resolves the region and credentials, then scans, classifies and deletes
 * the patching resources this tool's conventions own.
 */

import { PatchControlPlane } from '@shared/aws/controlPlane';
import { credentialsForProfile, resolveRegion, verifyCredentials } from '@shared/aws/region';
import { ExitCode, reportFatal } from '@shared/cli';
import { loadExecutionConcurrency } from '@shared/settings';
import { setupLogger } from '@shared/utils/logger';
import { parseDecommissionArgs, USAGE } from './core/args';
import { Decommissioner } from './core/decommissioner';

export interface MainOptions {
  /** Abort to stop dispatching new remote calls. */
  signal?: AbortSignal;
  env?: Record<string, string | undefined>;
}

/**
 * Run the decommissioning tool.
 *
 * @param argv - Arguments without the node and script paths
 * @returns Process exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  let logger = setupLogger('patch-scheduler:decommission');

  try {
    const args = parseDecommissionArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return ExitCode.Success;
    }
    logger = setupLogger('patch-scheduler:decommission', args.logLevel);

    const concurrency = loadExecutionConcurrency(options.env ?? process.env);

    const credentials = credentialsForProfile(args.profile);
    const region = await resolveRegion({
      override: args.region,
      profile: args.profile,
      credentials,
      logLevel: args.logLevel,
    });
    const identity = await verifyCredentials(region, credentials);
    logger.info({ region, account: identity.account, arn: identity.arn }, 'Credentials verified');

    const decommissioner = new Decommissioner(new PatchControlPlane({ region, credentials }), {
      concurrency,
      logLevel: args.logLevel,
      signal: options.signal,
    });
    const summary = await decommissioner.run();

    return summary.failed > 0 || summary.cancelled ? ExitCode.OperationFailed : ExitCode.Success;
  } catch (error) {
    return reportFatal(logger, error);
  }
}

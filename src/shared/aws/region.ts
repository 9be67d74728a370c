/**
 * Region and credential resolution.
 *
 * A run operates against exactly one region: the explicit override when it is
 * enabled for the account, otherwise whatever the SDK default chain
 * (environment, shared config file) resolves.
 */

import { EC2Client, DescribeRegionsCommand } from '@aws-sdk/client-ec2';
import { SSMClient } from '@aws-sdk/client-ssm';
import {
  STSClient,
  GetCallerIdentityCommand,
  type GetCallerIdentityCommandOutput,
} from '@aws-sdk/client-sts';
import { fromSSO } from '@aws-sdk/credential-provider-sso';
import type { SSMClientConfig } from '@aws-sdk/client-ssm';
import { AuthResolutionError, describeError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

/**
 * Region queried for the region list when none is configured at all.
 */
const REGION_LIST_FALLBACK = 'us-east-1';

export type RegionProvider = () => Promise<string>;

export interface ResolveRegionOptions {
  override?: string;
  /** Named profile whose configured region is the default. */
  profile?: string;
  credentials?: SSMClientConfig['credentials'];
  /** Resolves the SDK default region; injectable for tests. */
  defaultRegion?: RegionProvider;
  logLevel?: string;
}

export interface CallerIdentity {
  account: string;
  arn: string;
  userId: string;
}

/**
 * SDK default-chain region, as an SSM client for the profile would resolve it.
 */
export function sdkDefaultRegion(profile?: string): Promise<string> {
  return new SSMClient({ profile }).config.region();
}

function defaultRegionFor(options: ResolveRegionOptions): Promise<string> {
  return options.defaultRegion ? options.defaultRegion() : sdkDefaultRegion(options.profile);
}

/**
 * Credentials for an optional named SSO profile; undefined selects the default chain.
 */
export function credentialsForProfile(profile?: string): SSMClientConfig['credentials'] {
  return profile ? fromSSO({ profile }) : undefined;
}

/**
 * List the regions enabled for the account.
 */
export async function listRegions(
  options: Omit<ResolveRegionOptions, 'override'> = {}
): Promise<string[]> {
  const logger = setupLogger('patch-scheduler:region', options.logLevel);
  const queryRegion = await defaultRegionFor(options).catch(() => {
    logger.debug(`No default region configured; listing regions from ${REGION_LIST_FALLBACK}`);
    return REGION_LIST_FALLBACK;
  });

  const client = new EC2Client({ region: queryRegion, credentials: options.credentials });

  try {
    const response = await client.send(new DescribeRegionsCommand({}));
    return (response.Regions ?? []).flatMap((r) => (r.RegionName ? [r.RegionName] : []));
  } catch (error) {
    throw new AuthResolutionError(`Could not list AWS regions: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/**
 * Resolve the single region a run operates against.
 *
 * @throws {AuthResolutionError} If the override is not an enabled region, or no region is configured
 */
export async function resolveRegion(options: ResolveRegionOptions = {}): Promise<string> {
  const logger = setupLogger('patch-scheduler:region', options.logLevel);

  if (options.override) {
    const regions = await listRegions(options);
    if (!regions.includes(options.override)) {
      throw new AuthResolutionError(
        `Could not find region ${options.override} in list of available regions`
      );
    }
    logger.debug({ region: options.override }, 'Using region override');
    return options.override;
  }

  try {
    const region = await defaultRegionFor(options);
    logger.debug({ region }, 'Using default region');
    return region;
  } catch (error) {
    throw new AuthResolutionError(
      'Could not establish region. Specify --region or configure a default AWS region',
      { cause: error }
    );
  }
}

/**
 * Verify credentials by calling STS GetCallerIdentity.
 *
 * @throws {AuthResolutionError} If the credentials are missing, expired or rejected
 */
export async function verifyCredentials(
  region: string,
  credentials?: SSMClientConfig['credentials']
): Promise<CallerIdentity> {
  const client = new STSClient({ region, credentials });

  let response: GetCallerIdentityCommandOutput;
  try {
    response = await client.send(new GetCallerIdentityCommand({}));
  } catch (error) {
    const message = describeError(error);
    if (message.includes('Token has expired')) {
      throw new AuthResolutionError('SSO session expired. Run: aws sso login', { cause: error });
    }
    throw new AuthResolutionError(`Credential verification failed: ${message}`, { cause: error });
  }

  if (!response.Account || !response.Arn || !response.UserId) {
    throw new AuthResolutionError('GetCallerIdentity returned incomplete response');
  }

  return { account: response.Account, arn: response.Arn, userId: response.UserId };
}

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  SSMClient,
  DeleteMaintenanceWindowCommand,
  DescribeMaintenanceWindowsCommand,
  DescribeMaintenanceWindowTasksCommand,
  DescribePatchBaselinesCommand,
  DescribePatchGroupsCommand,
} from '@aws-sdk/client-ssm';
import { AuthResolutionError } from '@shared/errors';

const { mockResolveRegion, mockVerifyCredentials } = vi.hoisted(() => ({
  mockResolveRegion: vi.fn(),
  mockVerifyCredentials: vi.fn(),
}));

vi.mock('@shared/aws/region', () => ({
  credentialsForProfile: () => undefined,
  resolveRegion: mockResolveRegion,
  verifyCredentials: mockVerifyCredentials,
}));

import { main } from '@functions/decommission/index';

const ssmMock = mockClient(SSMClient);

describe('decommission main', () => {
  beforeEach(() => {
    ssmMock.reset();
    mockResolveRegion.mockReset().mockResolvedValue('eu-west-1');
    mockVerifyCredentials.mockReset().mockResolvedValue({
      account: '000000000000',
      arn: 'arn:aws:iam::000000000000:user/test-user',
      userId: 'TESTUSERID',
    });

    ssmMock.on(DescribeMaintenanceWindowsCommand).resolves({
      WindowIdentities: [{ WindowId: 'mw-1' }],
    });
    ssmMock.on(DescribeMaintenanceWindowTasksCommand).resolves({ Tasks: [] });
    ssmMock.on(DescribePatchGroupsCommand).resolves({});
    ssmMock.on(DescribePatchBaselinesCommand).resolves({});
  });

  it('should exit 0 after deleting everything it owns', async () => {
    ssmMock.on(DeleteMaintenanceWindowCommand).resolves({});

    const code = await main(['--region', 'eu-west-1']);

    expect(code).toBe(0);
    expect(mockResolveRegion).toHaveBeenCalledWith({
      override: 'eu-west-1',
      profile: undefined,
      credentials: undefined,
      logLevel: undefined,
    });
    expect(ssmMock.commandCalls(DeleteMaintenanceWindowCommand)[0]?.args[0].input).toEqual({
      WindowId: 'mw-1',
    });
  });

  it('should exit 1 when a deletion fails', async () => {
    ssmMock.on(DeleteMaintenanceWindowCommand).rejects(new Error('Window is executing'));

    await expect(main([])).resolves.toBe(1);
  });

  it('should exit 1 when the inventory cannot be listed', async () => {
    ssmMock.reset();
    ssmMock.on(DescribeMaintenanceWindowsCommand).rejects(new Error('AccessDeniedException'));

    await expect(main([])).resolves.toBe(1);
    expect(ssmMock.commandCalls(DeleteMaintenanceWindowCommand)).toHaveLength(0);
  });

  it('should exit 2 on an unknown option', async () => {
    await expect(main(['--force'])).resolves.toBe(2);
    expect(mockResolveRegion).not.toHaveBeenCalled();
  });

  it('should resolve the region for the named profile', async () => {
    ssmMock.on(DeleteMaintenanceWindowCommand).resolves({});

    await expect(main(['--profile', 'ops'], { env: {} })).resolves.toBe(0);
    expect(mockResolveRegion).toHaveBeenCalledWith({
      override: undefined,
      profile: 'ops',
      credentials: undefined,
      logLevel: undefined,
    });
  });

  it('should exit 2 on an invalid execution concurrency', async () => {
    const code = await main([], { env: { PATCH_EXECUTION_CONCURRENCY: '0' } });

    expect(code).toBe(2);
    expect(mockResolveRegion).not.toHaveBeenCalled();
  });

  it('should exit 3 when the region cannot be resolved', async () => {
    mockResolveRegion.mockRejectedValue(
      new AuthResolutionError('Could not find region xx-east-9 in list of available regions')
    );

    await expect(main(['-r', 'xx-east-9'])).resolves.toBe(3);
    expect(ssmMock.calls()).toHaveLength(0);
  });

  it('should exit 1 without deleting when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(main([], { signal: controller.signal })).resolves.toBe(1);
    expect(ssmMock.commandCalls(DeleteMaintenanceWindowCommand)).toHaveLength(0);
  });
});

/**
 * AWS Systems Manager control-plane client.
 *
 * Thin wrapper over SSMClient exposing the create, list and delete calls the
 * provisioner and decommissioner need. Every rejected call is rethrown as a
 * RemoteOperationError naming the action and resource.
 */

import {
  SSMClient,
  CreateMaintenanceWindowCommand,
  CreatePatchBaselineCommand,
  DeleteMaintenanceWindowCommand,
  DeletePatchBaselineCommand,
  DeregisterPatchBaselineForPatchGroupCommand,
  DeregisterTaskFromMaintenanceWindowCommand,
  DescribeMaintenanceWindowsCommand,
  DescribeMaintenanceWindowTasksCommand,
  DescribePatchBaselinesCommand,
  DescribePatchGroupsCommand,
  MaintenanceWindowResourceType,
  MaintenanceWindowTaskType,
  RegisterPatchBaselineForPatchGroupCommand,
  RegisterTargetWithMaintenanceWindowCommand,
  RegisterTaskWithMaintenanceWindowCommand,
  type CreatePatchBaselineCommandInput,
  type SSMClientConfig,
} from '@aws-sdk/client-ssm';
import type {
  CustomBaselineRecord,
  OperationAction,
  OperationResourceType,
  RegistrationRecord,
  TaskRecord,
  WindowRecord,
} from '@shared/types';
import { RemoteOperationError } from '@shared/errors';
import { collectPages } from '@shared/utils/paginate';

/**
 * Documents a maintenance window task runs to scan for or install patches.
 */
export const APPLY_PATCH_BASELINE_ACTION = 'AWS-ApplyPatchBaseline';
export const RUN_PATCH_BASELINE_ACTION = 'AWS-RunPatchBaseline';

/**
 * Instance tag that assigns managed nodes to a patch group.
 */
export const PATCH_GROUP_TAG_KEY = 'tag:Patch Group';

export interface ControlPlaneOptions {
  region: string;
  credentials?: SSMClientConfig['credentials'];
}

export interface CreateWindowInput {
  name: string;
  description: string;
  schedule: string;
  timezone?: string;
  durationHours: number;
  cutoffHours: number;
}

export interface RegisterPatchTaskInput {
  windowId: string;
  targetId: string;
  name: string;
  operation: 'Install' | 'Scan';
  maxConcurrency: string;
  maxErrors: string;
}

/**
 * Build the identifier used for a baseline-to-patch-group registration.
 */
export function registrationId(baselineId: string, patchGroup: string): string {
  return `${baselineId}/${patchGroup}`;
}

export class PatchControlPlane {
  private readonly client: SSMClient;
  readonly region: string;

  constructor(options: ControlPlaneOptions) {
    this.region = options.region;
    this.client = new SSMClient({ region: options.region, credentials: options.credentials });
  }

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  /**
   * Create a custom patch baseline.
   *
   * @returns The new baseline ID
   */
  async createPatchBaseline(input: CreatePatchBaselineCommandInput): Promise<string> {
    return this.call('create', 'patch-baseline', input.Name ?? 'unnamed', async () => {
      const response = await this.client.send(new CreatePatchBaselineCommand(input));
      return requireId(response.BaselineId, 'BaselineId');
    });
  }

  /**
   * Register a baseline for a patch group.
   *
   * @returns The registration identifier (`<baselineId>/<patchGroup>`)
   */
  async registerPatchBaselineForPatchGroup(
    baselineId: string,
    patchGroup: string
  ): Promise<string> {
    const id = registrationId(baselineId, patchGroup);
    return this.call('register', 'baseline-registration', id, async () => {
      await this.client.send(
        new RegisterPatchBaselineForPatchGroupCommand({
          BaselineId: baselineId,
          PatchGroup: patchGroup,
        })
      );
      return id;
    });
  }

  /**
   * Create a maintenance window.
   *
   * @returns The new window ID
   */
  async createMaintenanceWindow(input: CreateWindowInput): Promise<string> {
    return this.call('create', 'window', input.name, async () => {
      const response = await this.client.send(
        new CreateMaintenanceWindowCommand({
          Name: input.name,
          Description: input.description,
          Schedule: input.schedule,
          ScheduleTimezone: input.timezone,
          Duration: input.durationHours,
          Cutoff: input.cutoffHours,
          AllowUnassociatedTargets: false,
        })
      );
      return requireId(response.WindowId, 'WindowId');
    });
  }

  /**
   * Register the instances of a patch group as a window target.
   *
   * @returns The new window target ID
   */
  async registerPatchGroupTarget(
    windowId: string,
    patchGroup: string,
    name: string
  ): Promise<string> {
    return this.call('register', 'window-target', `${windowId}/${name}`, async () => {
      const response = await this.client.send(
        new RegisterTargetWithMaintenanceWindowCommand({
          WindowId: windowId,
          ResourceType: MaintenanceWindowResourceType.Instance,
          Targets: [{ Key: PATCH_GROUP_TAG_KEY, Values: [patchGroup] }],
          Name: name,
        })
      );
      return requireId(response.WindowTargetId, 'WindowTargetId');
    });
  }

  /**
   * Register the patching task for a window target.
   *
   * @returns The new window task ID
   */
  async registerPatchTask(input: RegisterPatchTaskInput): Promise<string> {
    return this.call('register', 'task', `${input.windowId}/${input.name}`, async () => {
      const response = await this.client.send(
        new RegisterTaskWithMaintenanceWindowCommand({
          WindowId: input.windowId,
          Name: input.name,
          Targets: [{ Key: 'WindowTargetIds', Values: [input.targetId] }],
          TaskArn: RUN_PATCH_BASELINE_ACTION,
          TaskType: MaintenanceWindowTaskType.RunCommand,
          Priority: 1,
          MaxConcurrency: input.maxConcurrency,
          MaxErrors: input.maxErrors,
          TaskInvocationParameters: {
            RunCommand: {
              Parameters: { Operation: [input.operation] },
            },
          },
        })
      );
      return requireId(response.WindowTaskId, 'WindowTaskId');
    });
  }

  // ---------------------------------------------------------------------------
  // List
  // ---------------------------------------------------------------------------

  async listMaintenanceWindows(): Promise<WindowRecord[]> {
    return this.call('list', 'window', '*', () =>
      collectPages(async (nextToken) => {
        const response = await this.client.send(
          new DescribeMaintenanceWindowsCommand({ NextToken: nextToken })
        );
        const items: WindowRecord[] = [];
        for (const identity of response.WindowIdentities ?? []) {
          if (identity.WindowId) {
            items.push({
              kind: 'window',
              id: identity.WindowId,
              name: identity.Name,
              description: identity.Description,
            });
          }
        }
        return { items, nextToken: response.NextToken };
      })
    );
  }

  async listWindowTasks(windowId: string): Promise<TaskRecord[]> {
    return this.call('list', 'task', `${windowId}/*`, () =>
      collectPages(async (nextToken) => {
        const response = await this.client.send(
          new DescribeMaintenanceWindowTasksCommand({ WindowId: windowId, NextToken: nextToken })
        );
        const items: TaskRecord[] = [];
        for (const task of response.Tasks ?? []) {
          if (task.WindowTaskId) {
            items.push({
              kind: 'task',
              id: task.WindowTaskId,
              windowId,
              // A task with no recorded action can never count as a patching task
              action: task.TaskArn ?? '',
              name: task.Name,
            });
          }
        }
        return { items, nextToken: response.NextToken };
      })
    );
  }

  async listPatchGroupRegistrations(): Promise<RegistrationRecord[]> {
    return this.call('list', 'baseline-registration', '*', () =>
      collectPages(async (nextToken) => {
        const response = await this.client.send(
          new DescribePatchGroupsCommand({ NextToken: nextToken })
        );
        const items: RegistrationRecord[] = [];
        for (const mapping of response.Mappings ?? []) {
          const baselineId = mapping.BaselineIdentity?.BaselineId;
          if (mapping.PatchGroup && baselineId) {
            items.push({
              kind: 'baseline-registration',
              id: registrationId(baselineId, mapping.PatchGroup),
              patchGroup: mapping.PatchGroup,
              baselineId,
              name: mapping.BaselineIdentity?.BaselineName,
            });
          }
        }
        return { items, nextToken: response.NextToken };
      })
    );
  }

  /**
   * List baselines owned by this account. Predefined baselines are never returned.
   */
  async listCustomBaselines(): Promise<CustomBaselineRecord[]> {
    return this.call('list', 'custom-baseline', '*', () =>
      collectPages(async (nextToken) => {
        const response = await this.client.send(
          new DescribePatchBaselinesCommand({
            Filters: [{ Key: 'OWNER', Values: ['Self'] }],
            NextToken: nextToken,
          })
        );
        const items: CustomBaselineRecord[] = [];
        for (const identity of response.BaselineIdentities ?? []) {
          if (identity.BaselineId) {
            items.push({
              kind: 'custom-baseline',
              id: identity.BaselineId,
              name: identity.BaselineName,
              operatingSystem: identity.OperatingSystem,
            });
          }
        }
        return { items, nextToken: response.NextToken };
      })
    );
  }

  // ---------------------------------------------------------------------------
  // Delete
  // ---------------------------------------------------------------------------

  async deregisterTask(windowId: string, taskId: string): Promise<void> {
    await this.call('deregister', 'task', taskId, () =>
      this.client.send(
        new DeregisterTaskFromMaintenanceWindowCommand({ WindowId: windowId, WindowTaskId: taskId })
      )
    );
  }

  async deleteMaintenanceWindow(windowId: string): Promise<void> {
    await this.call('delete', 'window', windowId, () =>
      this.client.send(new DeleteMaintenanceWindowCommand({ WindowId: windowId }))
    );
  }

  async deregisterPatchBaselineForPatchGroup(baselineId: string, patchGroup: string): Promise<void> {
    await this.call('deregister', 'baseline-registration', registrationId(baselineId, patchGroup), () =>
      this.client.send(
        new DeregisterPatchBaselineForPatchGroupCommand({
          BaselineId: baselineId,
          PatchGroup: patchGroup,
        })
      )
    );
  }

  async deletePatchBaseline(baselineId: string): Promise<void> {
    await this.call('delete', 'custom-baseline', baselineId, () =>
      this.client.send(new DeletePatchBaselineCommand({ BaselineId: baselineId }))
    );
  }

  private async call<T>(
    action: OperationAction,
    resourceType: OperationResourceType,
    resourceId: string,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new RemoteOperationError(action, resourceType, resourceId, { cause: error });
    }
  }
}

function requireId(value: string | undefined, field: string): string {
  if (!value) {
    throw new Error(`Response did not include ${field}`);
  }
  return value;
}

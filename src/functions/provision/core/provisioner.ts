/**
 * Provisioner for SSM patching resources.
 *
 * Creates the custom patch baseline, registers it for its patch group once,
 * then creates one maintenance window (with target and patching task) per
 * recurrence spec. Single resource failures don't interrupt the overall flow.
 */

import type { Logger } from 'pino';
import type {
  BaselineDescriptor,
  OperationResult,
  ProvisionReport,
  ProvisionResult,
  ProvisionSettings,
  RecurrenceSpec,
} from '@shared/types';
import { registrationId, type PatchControlPlane } from '@shared/aws/controlPlane';
import { describeError, RemoteOperationError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import { runInBatches } from '@shared/utils/concurrency';
import { failed, succeeded, summarize } from '@shared/utils/results';
import { toCreatePatchBaselineInput } from './baseline';
import { toScheduleExpression, toWindowDescription, toWindowName } from './cron';

export interface ProvisionerOptions {
  settings: ProvisionSettings;
  logLevel?: string;
  /** Once aborted, no further remote calls are dispatched. */
  signal?: AbortSignal;
}

interface WindowOutcome {
  result: ProvisionResult;
  operations: OperationResult[];
}

export class Provisioner {
  private readonly controlPlane: PatchControlPlane;
  private readonly settings: ProvisionSettings;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  constructor(controlPlane: PatchControlPlane, options: ProvisionerOptions) {
    this.controlPlane = controlPlane;
    this.settings = options.settings;
    this.signal = options.signal;
    this.logger = setupLogger('patch-scheduler:provisioner', options.logLevel);
  }

  /**
   * Provision the baseline, its patch-group registration, and one window per spec.
   *
   * Never throws for remote failures: they are recorded in the report.
   *
   * @returns Report whose `windows` follow the order of `specs`
   */
  async provision(
    specs: readonly RecurrenceSpec[],
    baseline: BaselineDescriptor
  ): Promise<ProvisionReport> {
    this.logger.info(
      {
        region: this.controlPlane.region,
        windows: specs.length,
        patchGroup: baseline.patchGroup,
      },
      'Starting provisioning'
    );

    const operations: OperationResult[] = [];

    const baselineId = await this.createBaseline(baseline, operations);
    if (baselineId) {
      await this.registerBaseline(baselineId, baseline.patchGroup, operations);
    }

    const outcome = await runInBatches(
      specs,
      this.settings.executionConcurrency,
      (spec) => this.provisionWindow(spec, baseline.patchGroup),
      this.signal
    );

    const windows = outcome.results.map((r) => r.result);
    for (const r of outcome.results) {
      operations.push(...r.operations);
    }

    const cancelled = this.signal?.aborted === true;
    if (outcome.skipped.length > 0) {
      this.logger.warn(
        { skipped: outcome.skipped.length },
        'Provisioning cancelled; remaining windows were not created'
      );
    }

    const report: ProvisionReport = {
      ...summarize(operations, cancelled),
      baselineId,
      windows,
    };

    this.logger.info(
      {
        total: report.total,
        succeeded: report.succeeded,
        failed: report.failed,
        cancelled: report.cancelled,
      },
      'Provisioning completed'
    );

    return report;
  }

  private async createBaseline(
    baseline: BaselineDescriptor,
    operations: OperationResult[]
  ): Promise<string | undefined> {
    if (this.signal?.aborted) {
      return undefined;
    }

    try {
      const baselineId = await this.controlPlane.createPatchBaseline(
        toCreatePatchBaselineInput(baseline)
      );
      this.logger.info({ baselineId, name: baseline.name }, 'Created patch baseline');
      operations.push(succeeded('create', 'patch-baseline', baselineId, 'Patch baseline created'));
      return baselineId;
    } catch (error) {
      this.logFailure(error, 'Failed to create patch baseline');
      operations.push(failed('create', 'patch-baseline', baseline.name, error));
      return undefined;
    }
  }

  private async registerBaseline(
    baselineId: string,
    patchGroup: string,
    operations: OperationResult[]
  ): Promise<void> {
    if (this.signal?.aborted) {
      return;
    }

    try {
      const id = await this.controlPlane.registerPatchBaselineForPatchGroup(baselineId, patchGroup);
      this.logger.info({ baselineId, patchGroup }, 'Registered patch baseline for patch group');
      operations.push(
        succeeded('register', 'baseline-registration', id, 'Baseline registered for patch group')
      );
    } catch (error) {
      this.logFailure(error, 'Failed to register patch baseline for patch group');
      operations.push(
        failed('register', 'baseline-registration', registrationId(baselineId, patchGroup), error)
      );
    }
  }

  /**
   * Create one window, its patch-group target and its patching task.
   * Later steps are skipped once an earlier one fails or the run is cancelled.
   */
  private async provisionWindow(spec: RecurrenceSpec, patchGroup: string): Promise<WindowOutcome> {
    const windowName = toWindowName(spec, this.settings.windowNamePrefix);
    const result: ProvisionResult = { spec, windowName, success: false };
    const operations: OperationResult[] = [];

    try {
      result.windowId = await this.controlPlane.createMaintenanceWindow({
        name: windowName,
        description: toWindowDescription(spec, patchGroup),
        schedule: toScheduleExpression(spec),
        timezone: spec.timezone,
        durationHours: this.settings.windowDurationHours,
        cutoffHours: this.settings.windowCutoffHours,
      });
      operations.push(succeeded('create', 'window', result.windowId, `Created window ${windowName}`));
      if (this.cancelledBefore(result, 'registering the window target')) {
        return { result, operations };
      }

      result.targetId = await this.controlPlane.registerPatchGroupTarget(
        result.windowId,
        patchGroup,
        `${windowName}-target`
      );
      operations.push(
        succeeded('register', 'window-target', result.targetId, `Registered patch group ${patchGroup}`)
      );
      if (this.cancelledBefore(result, 'registering the patching task')) {
        return { result, operations };
      }

      result.taskId = await this.controlPlane.registerPatchTask({
        windowId: result.windowId,
        targetId: result.targetId,
        name: `${windowName}-task`,
        operation: this.settings.patchOperation,
        maxConcurrency: this.settings.taskMaxConcurrency,
        maxErrors: this.settings.taskMaxErrors,
      });
      operations.push(succeeded('register', 'task', result.taskId, 'Registered patching task'));

      result.success = true;
      this.logger.info(
        { windowName, windowId: result.windowId, taskId: result.taskId },
        'Provisioned maintenance window'
      );
    } catch (error) {
      this.logFailure(error, 'Failed to provision maintenance window', { windowName });
      result.error = error instanceof Error ? error.message : String(error);
      if (error instanceof RemoteOperationError) {
        operations.push(failed(error.action, error.resourceType, error.resourceId, error));
      } else {
        operations.push(failed('create', 'window', windowName, error));
      }
    }

    return { result, operations };
  }

  private cancelledBefore(result: ProvisionResult, step: string): boolean {
    if (this.signal?.aborted !== true) {
      return false;
    }
    result.error = `Cancelled before ${step}`;
    this.logger.warn(
      { windowName: result.windowName, windowId: result.windowId },
      `Window left incomplete: cancelled before ${step}`
    );
    return true;
  }

  private logFailure(error: unknown, message: string, context: Record<string, unknown> = {}): void {
    if (error instanceof RemoteOperationError) {
      this.logger.error(
        {
          ...context,
          action: error.action,
          resourceType: error.resourceType,
          resourceId: error.resourceId,
          error: describeError(error.cause),
        },
        message
      );
    } else {
      this.logger.error({ ...context, error: String(error) }, message);
    }
  }
}

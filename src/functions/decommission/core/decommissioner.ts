/**
 * Decommissioner for SSM patching resources.
 *
 * Scans the inventory once, classifies ownership, then deletes what the
 * classifier marks as tool-owned:
 * - tasks of wholly-owned windows, then the windows themselves
 * - empty windows
 * - patch-group registrations, then custom baselines
 *
 * Windows carrying any non-patching task are left untouched. Single resource
 * failures don't interrupt the overall flow.
 */

import type { Logger } from 'pino';
import type { OperationResult, RunSummary } from '@shared/types';
import type { PatchControlPlane } from '@shared/aws/controlPlane';
import { RemoteOperationError, describeError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import { runInBatches } from '@shared/utils/concurrency';
import { failed, succeeded, summarize } from '@shared/utils/results';
import { planDeletion, type DeletionPlan, type WindowDeletion } from './classifier';
import { InventoryScanner } from './inventory';

export interface DecommissionerOptions {
  /** Bounded worker count for delete calls. */
  concurrency?: number;
  logLevel?: string;
  /** Once aborted, no further remote calls are dispatched. */
  signal?: AbortSignal;
}

export class Decommissioner {
  private static readonly DEFAULT_CONCURRENCY = 4;

  private readonly controlPlane: PatchControlPlane;
  private readonly scanner: InventoryScanner;
  private readonly concurrency: number;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  constructor(controlPlane: PatchControlPlane, options: DecommissionerOptions = {}) {
    this.controlPlane = controlPlane;
    this.concurrency = options.concurrency ?? Decommissioner.DEFAULT_CONCURRENCY;
    this.signal = options.signal;
    this.logger = setupLogger('patch-scheduler:decommissioner', options.logLevel);
    this.scanner = new InventoryScanner(controlPlane, {
      concurrency: this.concurrency,
      logLevel: options.logLevel,
    });
  }

  /**
   * Scan, classify and delete.
   *
   * @throws {RemoteOperationError} Only when the inventory scan fails, before any deletion
   */
  async run(): Promise<RunSummary> {
    const inventory = await this.scanner.scan();
    const plan = planDeletion(inventory);

    this.logger.info(
      {
        windows: plan.windows.length,
        retainedWindows: plan.retainedWindowIds.length,
        registrations: plan.registrations.length,
        customBaselines: plan.baselines.length,
      },
      'Deletion plan computed'
    );

    for (const windowId of plan.retainedWindowIds) {
      this.logger.info({ windowId }, 'Window has non-patching tasks; leaving it untouched');
    }

    return this.execute(plan);
  }

  /**
   * Carry out a deletion plan.
   */
  async execute(plan: DeletionPlan): Promise<RunSummary> {
    const results: OperationResult[] = [];
    let cancelled = false;

    const windowOutcome = await runInBatches(
      plan.windows,
      this.concurrency,
      (window) => this.deleteWindow(window),
      this.signal
    );
    results.push(...windowOutcome.results.flat());
    cancelled ||= windowOutcome.skipped.length > 0;

    // Registrations go first: a baseline still registered for a patch group cannot be deleted
    const registrationOutcome = await runInBatches(
      plan.registrations,
      this.concurrency,
      (registration) =>
        this.attempt('deregister', 'baseline-registration', registration.id, async () => {
          await this.controlPlane.deregisterPatchBaselineForPatchGroup(
            registration.baselineId,
            registration.patchGroup
          );
          return `Deregistered baseline ${registration.baselineId} from patch group ${registration.patchGroup}`;
        }),
      this.signal
    );
    results.push(...registrationOutcome.results);
    cancelled ||= registrationOutcome.skipped.length > 0;

    const baselineOutcome = await runInBatches(
      plan.baselines,
      this.concurrency,
      (baseline) =>
        this.attempt('delete', 'custom-baseline', baseline.id, async () => {
          await this.controlPlane.deletePatchBaseline(baseline.id);
          return `Deleted patch baseline ${baseline.name ?? baseline.id}`;
        }),
      this.signal
    );
    results.push(...baselineOutcome.results);
    cancelled ||= baselineOutcome.skipped.length > 0;
    cancelled ||= this.signal?.aborted === true;

    if (cancelled) {
      this.logger.warn('Decommissioning cancelled; remaining resources were not deleted');
    }

    const summary = summarize(results, cancelled);
    this.logger.info(
      {
        total: summary.total,
        succeeded: summary.succeeded,
        failed: summary.failed,
        cancelled: summary.cancelled,
      },
      'Decommissioning completed'
    );
    return summary;
  }

  /**
   * Deregister every task of a window, one at a time, then delete the window.
   *
   * The window deletion is only issued once all task deregistrations have been
   * attempted, and is skipped when any of them failed. After cancellation the
   * remaining steps of the window are not sent.
   */
  private async deleteWindow(window: WindowDeletion): Promise<OperationResult[]> {
    const taskResults: OperationResult[] = [];
    for (const taskId of window.taskIds) {
      if (this.stoppedBefore(window.windowId, `deregister task ${taskId}`)) {
        return taskResults;
      }
      taskResults.push(
        await this.attempt('deregister', 'task', taskId, async () => {
          await this.controlPlane.deregisterTask(window.windowId, taskId);
          return `Deregistered task from window ${window.windowId}`;
        })
      );
    }

    const failedTasks = taskResults.filter((r) => !r.success).length;
    if (failedTasks > 0) {
      this.logger.warn(
        { windowId: window.windowId, failedTasks },
        'Skipping window deletion because some tasks could not be deregistered'
      );
      return [
        ...taskResults,
        {
          success: false,
          action: 'delete',
          resourceType: 'window',
          resourceId: window.windowId,
          message: `Skipped deleting window ${window.windowId}`,
          error: `${failedTasks} task(s) could not be deregistered`,
        },
      ];
    }

    if (this.stoppedBefore(window.windowId, 'delete window')) {
      return taskResults;
    }

    const windowResult = await this.attempt('delete', 'window', window.windowId, async () => {
      await this.controlPlane.deleteMaintenanceWindow(window.windowId);
      return window.verdict === 'empty'
        ? 'Deleted empty window'
        : `Deleted window and ${window.taskIds.length} patching task(s)`;
    });

    return [...taskResults, windowResult];
  }

  private stoppedBefore(windowId: string, step: string): boolean {
    if (this.signal?.aborted !== true) {
      return false;
    }
    this.logger.warn({ windowId, step }, 'Cancelled; remaining window steps were not sent');
    return true;
  }

  private async attempt(
    action: OperationResult['action'],
    resourceType: OperationResult['resourceType'],
    resourceId: string,
    fn: () => Promise<string>
  ): Promise<OperationResult> {
    try {
      const message = await fn();
      this.logger.info({ action, resourceType, resourceId }, message);
      return succeeded(action, resourceType, resourceId, message);
    } catch (error) {
      this.logger.error(
        {
          action,
          resourceType,
          resourceId,
          error: describeError(error instanceof RemoteOperationError ? error.cause : error),
        },
        `Failed to ${action} ${resourceType}`
      );
      return failed(action, resourceType, resourceId, error);
    }
  }
}

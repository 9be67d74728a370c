/**
 * Resource inventory scanner.
 *
 * Captures one complete snapshot of maintenance windows, their tasks,
 * patch-group registrations and custom baselines. Deletion decisions are made
 * from this snapshot only, never from a partially-refreshed view.
 */

import type { Logger } from 'pino';
import type { Inventory, ManagedResourceRecord, TaskRecord } from '@shared/types';
import type { PatchControlPlane } from '@shared/aws/controlPlane';
import { setupLogger } from '@shared/utils/logger';
import { runInBatches } from '@shared/utils/concurrency';

export interface InventoryScannerOptions {
  /** Windows whose tasks are listed concurrently. */
  concurrency?: number;
  logLevel?: string;
}

export class InventoryScanner {
  private static readonly DEFAULT_CONCURRENCY = 4;

  private readonly controlPlane: PatchControlPlane;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(controlPlane: PatchControlPlane, options: InventoryScannerOptions = {}) {
    this.controlPlane = controlPlane;
    this.concurrency = options.concurrency ?? InventoryScanner.DEFAULT_CONCURRENCY;
    this.logger = setupLogger('patch-scheduler:inventory', options.logLevel);
  }

  /**
   * List every resource kind into a frozen snapshot.
   *
   * @throws {RemoteOperationError} If any listing call fails; an incomplete
   *   inventory is never returned
   */
  async scan(): Promise<Inventory> {
    this.logger.info({ region: this.controlPlane.region }, 'Scanning patching resources');

    const windows = await this.controlPlane.listMaintenanceWindows();

    // No signal: a scan is never cut short
    const taskLists = await runInBatches(windows, this.concurrency, (window) =>
      this.controlPlane.listWindowTasks(window.id)
    );
    const tasks: TaskRecord[] = taskLists.results.flat();

    const registrations = await this.controlPlane.listPatchGroupRegistrations();
    const baselines = await this.controlPlane.listCustomBaselines();

    const inventory: ManagedResourceRecord[] = [
      ...windows,
      ...tasks,
      ...registrations,
      ...baselines,
    ];

    this.logger.info(
      {
        windows: windows.length,
        tasks: tasks.length,
        registrations: registrations.length,
        customBaselines: baselines.length,
      },
      'Inventory captured'
    );

    return Object.freeze(inventory.map((record) => Object.freeze(record)));
  }
}

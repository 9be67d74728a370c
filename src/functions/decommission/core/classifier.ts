/**
 * Ownership classification over an inventory snapshot.
 *
 * Pure and total: every function here derives its answer from the whole
 * snapshot and never mutates it. When ownership is in doubt, nothing is
 * deleted.
 */

import type {
  CustomBaselineRecord,
  Inventory,
  ManagedResourceRecord,
  OwnershipVerdict,
  RegistrationRecord,
  TaskRecord,
  WindowRecord,
} from '@shared/types';
import {
  APPLY_PATCH_BASELINE_ACTION,
  RUN_PATCH_BASELINE_ACTION,
} from '@shared/aws/controlPlane';

/**
 * The only actions that make a task a patching task.
 */
export const PATCHING_ACTIONS: ReadonlySet<string> = new Set([
  APPLY_PATCH_BASELINE_ACTION,
  RUN_PATCH_BASELINE_ACTION,
]);

export interface WindowDeletion {
  windowId: string;
  verdict: Exclude<OwnershipVerdict, 'partially-foreign'>;
  /** Tasks to deregister before the window is deleted. */
  taskIds: string[];
}

export interface DeletionPlan {
  windows: WindowDeletion[];
  /** Windows left untouched because they carry foreign tasks. */
  retainedWindowIds: string[];
  registrations: RegistrationRecord[];
  baselines: CustomBaselineRecord[];
}

function isWindow(record: ManagedResourceRecord): record is WindowRecord {
  return record.kind === 'window';
}

function isTask(record: ManagedResourceRecord): record is TaskRecord {
  return record.kind === 'task';
}

function isRegistration(record: ManagedResourceRecord): record is RegistrationRecord {
  return record.kind === 'baseline-registration';
}

function isCustomBaseline(record: ManagedResourceRecord): record is CustomBaselineRecord {
  return record.kind === 'custom-baseline';
}

export function isPatchingTask(task: TaskRecord): boolean {
  return PATCHING_ACTIONS.has(task.action);
}

/**
 * Tasks of each window in the snapshot, keyed by window ID.
 * Windows with no tasks map to an empty list.
 */
export function tasksByWindow(inventory: Inventory): Map<string, TaskRecord[]> {
  const grouped = new Map<string, TaskRecord[]>();
  for (const window of inventory.filter(isWindow)) {
    grouped.set(window.id, []);
  }
  for (const task of inventory.filter(isTask)) {
    grouped.get(task.windowId)?.push(task);
  }
  return grouped;
}

function verdictFor(tasks: readonly TaskRecord[]): OwnershipVerdict {
  if (tasks.length === 0) {
    return 'empty';
  }
  return tasks.every(isPatchingTask) ? 'wholly-owned' : 'partially-foreign';
}

/**
 * Decide ownership of every window in the snapshot.
 */
export function classify(inventory: Inventory): Map<string, OwnershipVerdict> {
  const verdicts = new Map<string, OwnershipVerdict>();
  for (const [windowId, tasks] of tasksByWindow(inventory)) {
    verdicts.set(windowId, verdictFor(tasks));
  }
  return verdicts;
}

/**
 * Every patch-group registration is removable; registrations have no sub-resources.
 */
export function registrationsToRemove(inventory: Inventory): Set<string> {
  return new Set(inventory.filter(isRegistration).map((r) => r.id));
}

/**
 * Every custom baseline is removable; predefined baselines never appear as custom.
 */
export function customBaselinesToRemove(inventory: Inventory): Set<string> {
  return new Set(inventory.filter(isCustomBaseline).map((b) => b.id));
}

/**
 * Combine the verdicts into the list of deletions to perform.
 */
export function planDeletion(inventory: Inventory): DeletionPlan {
  const verdicts = classify(inventory);
  const tasks = tasksByWindow(inventory);
  const windows: WindowDeletion[] = [];
  const retainedWindowIds: string[] = [];

  for (const [windowId, verdict] of verdicts) {
    if (verdict === 'partially-foreign') {
      retainedWindowIds.push(windowId);
      continue;
    }
    windows.push({
      windowId,
      verdict,
      taskIds: (tasks.get(windowId) ?? []).map((t) => t.id),
    });
  }

  const registrationIds = registrationsToRemove(inventory);
  const baselineIds = customBaselinesToRemove(inventory);

  return {
    windows,
    retainedWindowIds,
    registrations: inventory.filter(isRegistration).filter((r) => registrationIds.has(r.id)),
    baselines: inventory.filter(isCustomBaseline).filter((b) => baselineIds.has(b.id)),
  };
}

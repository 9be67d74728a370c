/**
 * Core type definitions shared by the provisioning and decommissioning tools.
 */

import type { OperatingSystem, PatchComplianceLevel, PatchFilterKey } from '@aws-sdk/client-ssm';

/**
 * Canonical weekday order. Index is the weekday number (Monday = 0 ... Sunday = 6).
 */
export const WEEKDAYS = ['MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/**
 * One fully-resolved schedule instance: "the Nth <weekday> of the month at <hour>".
 *
 * The week ordinal counts occurrences of the weekday within the month, not
 * calendar weeks, so "TUE week 1" may fall after "WED week 1" on the calendar.
 */
export interface RecurrenceSpec {
  /** 1-based occurrence of the weekday within the month (1-5). */
  readonly weekOrdinal: number;
  readonly weekday: Weekday;
  /** Hour of day, 0-23. */
  readonly hour: number;
  /**
   * IANA timezone name (e.g. "Europe/London").
   * Absent means the remote scheduler's default (UTC).
   */
  readonly timezone?: string;
}

/**
 * Input to the schedule expander. Duplicates are allowed and removed before expansion.
 */
export interface ScheduleExpansionRequest {
  weeks: Iterable<number>;
  weekdays: Iterable<Weekday>;
  hours: Iterable<number>;
  timezone?: string;
}

/**
 * One approval rule of a patch baseline.
 */
export interface ApprovalRule {
  approveAfterDays: number;
  complianceLevel?: PatchComplianceLevel;
  enableNonSecurity?: boolean;
  filters: PatchFilter[];
}

/**
 * Patch filter, e.g. CLASSIFICATION in [Security, Bugfix].
 */
export interface PatchFilter {
  key: PatchFilterKey;
  values: string[];
}

/**
 * Declarative description of the patch baseline a provisioning run creates
 * and the patch group it is registered for.
 */
export interface BaselineDescriptor {
  name: string;
  description?: string;
  operatingSystem: OperatingSystem;
  patchGroup: string;
  approvalRules: ApprovalRule[];
  approvedPatches?: string[];
  rejectedPatches?: string[];
}

/**
 * Kinds of remote resources the inventory scanner reports.
 */
export type ResourceKind = 'window' | 'task' | 'baseline-registration' | 'custom-baseline';

/**
 * Resource types appearing in operation results. Window targets and created
 * baselines are only ever touched by the provisioner.
 */
export type OperationResourceType = ResourceKind | 'window-target' | 'patch-baseline';

export interface WindowRecord {
  kind: 'window';
  id: string;
  name?: string;
  description?: string;
}

export interface TaskRecord {
  kind: 'task';
  id: string;
  /** Identifier of the window the task is registered with. */
  windowId: string;
  /** Document or action the task invokes (e.g. "AWS-RunPatchBaseline"). */
  action: string;
  name?: string;
}

export interface RegistrationRecord {
  kind: 'baseline-registration';
  /** `<baselineId>/<patchGroup>` */
  id: string;
  patchGroup: string;
  baselineId: string;
  name?: string;
}

export interface CustomBaselineRecord {
  kind: 'custom-baseline';
  id: string;
  name?: string;
  operatingSystem?: string;
}

/**
 * One entry of the inventory snapshot.
 */
export type ManagedResourceRecord =
  | WindowRecord
  | TaskRecord
  | RegistrationRecord
  | CustomBaselineRecord;

/**
 * Read-only inventory snapshot, captured once per decommission run.
 */
export type Inventory = readonly ManagedResourceRecord[];

/**
 * Ownership decision for one maintenance window.
 *
 * - wholly-owned: one or more tasks, all of them patching tasks
 * - partially-foreign: at least one non-patching task; nothing is touched
 * - empty: no tasks at all
 */
export type OwnershipVerdict = 'wholly-owned' | 'partially-foreign' | 'empty';

export type OperationAction = 'create' | 'register' | 'deregister' | 'delete' | 'list';

/**
 * Outcome of one remote call.
 */
export interface OperationResult {
  success: boolean;
  action: OperationAction;
  resourceType: OperationResourceType;
  resourceId: string;
  message: string;
  error?: string;
}

/**
 * Summary of a provisioning or decommissioning run.
 */
export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** True when cancellation stopped the run before every call was dispatched. */
  cancelled: boolean;
  results: OperationResult[];
}

/**
 * Per-window outcome of a provisioning run.
 */
export interface ProvisionResult {
  spec: RecurrenceSpec;
  windowName: string;
  success: boolean;
  windowId?: string;
  targetId?: string;
  taskId?: string;
  error?: string;
}

/**
 * Full provisioning report: per-window results in schedule order plus the flat summary.
 */
export interface ProvisionReport extends RunSummary {
  baselineId?: string;
  windows: ProvisionResult[];
}

/**
 * Fixed provisioning policy, overridable through the environment.
 */
export interface ProvisionSettings {
  windowDurationHours: number;
  windowCutoffHours: number;
  windowNamePrefix: string;
  taskMaxConcurrency: string;
  taskMaxErrors: string;
  patchOperation: 'Install' | 'Scan';
  executionConcurrency: number;
}

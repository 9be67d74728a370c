/**
 * Builders for operation results and run summaries.
 */

import type {
  OperationAction,
  OperationResourceType,
  OperationResult,
  RunSummary,
} from '@shared/types';
import { describeError, RemoteOperationError } from '@shared/errors';

export function succeeded(
  action: OperationAction,
  resourceType: OperationResourceType,
  resourceId: string,
  message: string
): OperationResult {
  return { success: true, action, resourceType, resourceId, message };
}

export function failed(
  action: OperationAction,
  resourceType: OperationResourceType,
  resourceId: string,
  error: unknown
): OperationResult {
  // Report the control plane's own rejection rather than the wrapper
  const detail = describeError(error instanceof RemoteOperationError ? error.cause : error);
  return {
    success: false,
    action,
    resourceType,
    resourceId,
    message: `Failed to ${action} ${resourceType} ${resourceId}`,
    error: detail,
  };
}

/**
 * Count outcomes into a run summary.
 */
export function summarize(results: OperationResult[], cancelled: boolean = false): RunSummary {
  const succeededCount = results.filter((r) => r.success).length;

  return {
    total: results.length,
    succeeded: succeededCount,
    failed: results.length - succeededCount,
    cancelled,
    results,
  };
}

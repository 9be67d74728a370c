/**
 * Error kinds shared by both command-line tools.
 *
 * ConfigurationError, LoadError and AuthResolutionError are fatal and stop a
 * run before any remote side effect. RemoteOperationError is per-resource and
 * is recorded in the run summary instead of aborting sibling operations.
 */

import type { OperationAction, OperationResourceType } from './types';

/**
 * Invalid or empty schedule input, CLI arguments or settings.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the baseline descriptor cannot be read, parsed or validated.
 */
export class LoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LoadError';
  }
}

/**
 * Raised when no usable region or credentials can be resolved.
 */
export class AuthResolutionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthResolutionError';
  }
}

/**
 * A single remote call rejected by the control plane.
 */
export class RemoteOperationError extends Error {
  readonly action: OperationAction;
  readonly resourceType: OperationResourceType;
  readonly resourceId: string;

  constructor(
    action: OperationAction,
    resourceType: OperationResourceType,
    resourceId: string,
    options?: ErrorOptions
  ) {
    super(
      `Failed to ${action} ${resourceType} ${resourceId}: ${describeError(options?.cause)}`,
      options
    );
    this.name = 'RemoteOperationError';
    this.action = action;
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}

/**
 * Test data builders.
 */

import type {
  BaselineDescriptor,
  CustomBaselineRecord,
  ProvisionSettings,
  RegistrationRecord,
  TaskRecord,
  WindowRecord,
} from '@shared/types';

export function windowRecord(id: string, name?: string): WindowRecord {
  return { kind: 'window', id, name };
}

export function taskRecord(id: string, windowId: string, action: string): TaskRecord {
  return { kind: 'task', id, windowId, action };
}

export function registrationRecord(baselineId: string, patchGroup: string): RegistrationRecord {
  return {
    kind: 'baseline-registration',
    id: `${baselineId}/${patchGroup}`,
    baselineId,
    patchGroup,
  };
}

export function customBaselineRecord(id: string, name?: string): CustomBaselineRecord {
  return { kind: 'custom-baseline', id, name };
}

export const sampleSettings: ProvisionSettings = {
  windowDurationHours: 3,
  windowCutoffHours: 1,
  windowNamePrefix: 'patching',
  taskMaxConcurrency: '10%',
  taskMaxErrors: '10%',
  patchOperation: 'Install',
  executionConcurrency: 1,
};

export const sampleBaseline: BaselineDescriptor = {
  name: 'test-linux-baseline',
  description: 'Test baseline',
  operatingSystem: 'AMAZON_LINUX_2',
  patchGroup: 'test-group',
  approvalRules: [
    {
      approveAfterDays: 7,
      complianceLevel: 'CRITICAL',
      filters: [{ key: 'CLASSIFICATION', values: ['Security'] }],
    },
  ],
};

import { describe, it, expect } from 'vitest';
import { loadExecutionConcurrency, loadProvisionSettings } from '@shared/settings';
import { ConfigurationError } from '@shared/errors';

describe('loadProvisionSettings', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadProvisionSettings({})).toEqual({
      windowDurationHours: 3,
      windowCutoffHours: 1,
      windowNamePrefix: 'patching',
      taskMaxConcurrency: '10%',
      taskMaxErrors: '10%',
      patchOperation: 'Install',
      executionConcurrency: 4,
    });
  });

  it('should apply overrides', () => {
    const settings = loadProvisionSettings({
      PATCH_WINDOW_DURATION_HOURS: '4',
      PATCH_WINDOW_CUTOFF_HOURS: '2',
      PATCH_WINDOW_NAME_PREFIX: 'prod-patch',
      PATCH_TASK_MAX_CONCURRENCY: '5',
      PATCH_TASK_MAX_ERRORS: '100%',
      PATCH_OPERATION: 'Scan',
      PATCH_EXECUTION_CONCURRENCY: '8',
    });

    expect(settings).toEqual({
      windowDurationHours: 4,
      windowCutoffHours: 2,
      windowNamePrefix: 'prod-patch',
      taskMaxConcurrency: '5',
      taskMaxErrors: '100%',
      patchOperation: 'Scan',
      executionConcurrency: 8,
    });
  });

  it('should treat empty variables as unset and ignore unrelated ones', () => {
    const settings = loadProvisionSettings({
      PATCH_OPERATION: '',
      HOME: '/root',
      AWS_REGION: 'eu-west-1',
    });

    expect(settings.patchOperation).toBe('Install');
  });

  it('should reject a cutoff that is not shorter than the duration', () => {
    const env = { PATCH_WINDOW_DURATION_HOURS: '2', PATCH_WINDOW_CUTOFF_HOURS: '2' };

    expect(() => loadProvisionSettings(env)).toThrow(ConfigurationError);
    expect(() => loadProvisionSettings(env)).toThrow(
      'Invalid provisioning settings: PATCH_WINDOW_CUTOFF_HOURS: cutoff must be shorter than the window duration'
    );
  });

  it.each(['0%', '101%', '0', 'ten', '05'])('should reject task rate %s', (rate) => {
    expect(() => loadProvisionSettings({ PATCH_TASK_MAX_ERRORS: rate })).toThrow(
      'Invalid provisioning settings: PATCH_TASK_MAX_ERRORS: '
    );
  });

  it('should reject an unknown operation', () => {
    expect(() => loadProvisionSettings({ PATCH_OPERATION: 'Reboot' })).toThrow(
      'PATCH_OPERATION: '
    );
  });

  it('should reject a window name prefix with spaces', () => {
    expect(() => loadProvisionSettings({ PATCH_WINDOW_NAME_PREFIX: 'my windows' })).toThrow(
      'PATCH_WINDOW_NAME_PREFIX: letters, digits, "_", "-" and "." only'
    );
  });
});

describe('loadExecutionConcurrency', () => {
  it('should default to 4', () => {
    expect(loadExecutionConcurrency({})).toBe(4);
  });

  it('should read PATCH_EXECUTION_CONCURRENCY and ignore other overrides', () => {
    expect(
      loadExecutionConcurrency({ PATCH_EXECUTION_CONCURRENCY: '2', PATCH_OPERATION: 'Reboot' })
    ).toBe(2);
  });

  it('should reject a concurrency below 1', () => {
    expect(() => loadExecutionConcurrency({ PATCH_EXECUTION_CONCURRENCY: '0' })).toThrow(
      'Invalid execution settings: PATCH_EXECUTION_CONCURRENCY: Number must be greater than or equal to 1'
    );
  });
});

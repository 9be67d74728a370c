import { describe, it, expect } from 'vitest';
import { failed, succeeded, summarize } from '@shared/utils/results';
import { RemoteOperationError, describeError } from '@shared/errors';

describe('results', () => {
  it('should build a successful result', () => {
    expect(succeeded('delete', 'window', 'mw-1', 'Deleted empty window')).toEqual({
      success: true,
      action: 'delete',
      resourceType: 'window',
      resourceId: 'mw-1',
      message: 'Deleted empty window',
    });
  });

  it('should report the cause of a remote operation error', () => {
    const error = new RemoteOperationError('delete', 'window', 'mw-1', {
      cause: new Error('Window is executing'),
    });

    expect(failed('delete', 'window', 'mw-1', error)).toEqual({
      success: false,
      action: 'delete',
      resourceType: 'window',
      resourceId: 'mw-1',
      message: 'Failed to delete window mw-1',
      error: 'Window is executing',
    });
  });

  it('should prefix named errors with their name', () => {
    expect(failed('create', 'window', 'w', new TypeError('bad input')).error).toBe(
      'TypeError: bad input'
    );
    expect(failed('create', 'window', 'w', 'plain string').error).toBe('plain string');
  });

  it('should count outcomes', () => {
    const results = [
      succeeded('delete', 'window', 'a', 'ok'),
      failed('delete', 'window', 'b', new Error('no')),
      succeeded('delete', 'window', 'c', 'ok'),
    ];

    expect(summarize(results)).toEqual({
      total: 3,
      succeeded: 2,
      failed: 1,
      cancelled: false,
      results,
    });
    expect(summarize([], true)).toMatchObject({ total: 0, cancelled: true });
  });
});

describe('describeError', () => {
  it('should render causes and non-errors', () => {
    expect(describeError(new Error('plain'))).toBe('plain');
    expect(describeError(42)).toBe('42');
    expect(
      new RemoteOperationError('list', 'task', 'mw-1/*', { cause: new RangeError('too many') })
        .message
    ).toBe('Failed to list task mw-1/*: RangeError: too many');
  });
});

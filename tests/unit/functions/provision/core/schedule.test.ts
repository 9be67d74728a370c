import { describe, it, expect } from 'vitest';
import { expand, isValidTimezone, parseWeekday } from '@functions/provision/core/schedule';
import { ConfigurationError } from '@shared/errors';
import type { RecurrenceSpec } from '@shared/types';

function key(spec: RecurrenceSpec): string {
  return `${spec.weekOrdinal}-${spec.weekday}-${spec.hour}`;
}

describe('expand', () => {
  it('should produce 8 specs for the default schedule with week 1 before week 2', () => {
    const specs = expand({ weeks: [1, 2], weekdays: ['TUE', 'WED'], hours: [3, 4] });

    expect(specs).toHaveLength(8);
    expect(specs.slice(0, 4).every((s) => s.weekOrdinal === 1)).toBe(true);
    expect(specs.slice(4).every((s) => s.weekOrdinal === 2)).toBe(true);
    expect(specs.every((s) => s.timezone === undefined)).toBe(true);
  });

  it('should return one distinct spec per combination', () => {
    const specs = expand({ weeks: [1, 3, 5], weekdays: ['MON', 'FRI'], hours: [0, 12, 23] });

    expect(specs).toHaveLength(18);
    expect(new Set(specs.map(key)).size).toBe(18);
  });

  it('should cover exactly the cross product', () => {
    const specs = expand({ weeks: [2], weekdays: ['SAT', 'SUN'], hours: [22] });

    expect(specs.map(key).sort()).toEqual(['2-SAT-22', '2-SUN-22']);
  });

  it('should group by week ordinal ascending regardless of input order', () => {
    const specs = expand({ weeks: [4, 1, 3], weekdays: ['SUN', 'MON'], hours: [9, 1] });
    const weeks = specs.map((s) => s.weekOrdinal);

    for (const week of [1, 3]) {
      const next = week === 1 ? 3 : 4;
      expect(weeks.lastIndexOf(week)).toBeLessThan(weeks.indexOf(next));
    }
  });

  it('should deduplicate repeated inputs', () => {
    const specs = expand({ weeks: [1, 1, 2], weekdays: ['TUE', 'TUE'], hours: [3, 3] });

    expect(specs.map(key)).toEqual(['1-TUE-3', '2-TUE-3']);
  });

  it('should carry the timezone on every spec', () => {
    const specs = expand({
      weeks: [1],
      weekdays: ['WED'],
      hours: [4, 5],
      timezone: 'Europe/London',
    });

    expect(specs.map((s) => s.timezone)).toEqual(['Europe/London', 'Europe/London']);
  });

  it('should return frozen specs', () => {
    const [spec] = expand({ weeks: [1], weekdays: ['TUE'], hours: [3] });

    expect(Object.isFrozen(spec)).toBe(true);
  });

  it.each([
    ['weeks', { weeks: [], weekdays: ['TUE' as const], hours: [3] }, 'At least one week is required'],
    ['weekdays', { weeks: [1], weekdays: [], hours: [3] }, 'At least one weekday is required'],
    ['hours', { weeks: [1], weekdays: ['TUE' as const], hours: [] }, 'At least one hour is required'],
  ])('should reject empty %s', (_label, request, message) => {
    expect(() => expand(request)).toThrow(ConfigurationError);
    expect(() => expand(request)).toThrow(message);
  });

  it.each([
    [{ weeks: [0], weekdays: ['TUE' as const], hours: [3] }, 'Invalid week 0'],
    [{ weeks: [6], weekdays: ['TUE' as const], hours: [3] }, 'Invalid week 6'],
    [{ weeks: [1.5], weekdays: ['TUE' as const], hours: [3] }, 'Invalid week 1.5'],
    [{ weeks: [1], weekdays: ['TUE' as const], hours: [24] }, 'Invalid hour 24'],
    [{ weeks: [1], weekdays: ['TUE' as const], hours: [-1] }, 'Invalid hour -1'],
  ])('should reject out-of-range values (%#)', (request, message) => {
    expect(() => expand(request)).toThrow(message);
  });

  it('should reject an unknown timezone', () => {
    expect(() =>
      expand({ weeks: [1], weekdays: ['TUE'], hours: [3], timezone: 'Mars/Olympus_Mons' })
    ).toThrow("Invalid timezone 'Mars/Olympus_Mons'");
  });
});

describe('parseWeekday', () => {
  it.each([
    ['TUE', 'TUE'],
    ['tue', 'TUE'],
    ['Tuesday', 'TUE'],
    [' sunday ', 'SUN'],
  ])('should parse %s', (input, expected) => {
    expect(parseWeekday(input)).toBe(expected);
  });

  it('should reject unknown names', () => {
    expect(() => parseWeekday('funday')).toThrow(
      "Invalid weekday 'funday'. Valid weekdays: MON, TUE, WED, THU, FRI, SAT, SUN"
    );
  });

  it('should not match object prototype keys', () => {
    expect(() => parseWeekday('constructor')).toThrow(ConfigurationError);
  });
});

describe('isValidTimezone', () => {
  it('should accept IANA names and reject garbage', () => {
    expect(isValidTimezone('America/New_York')).toBe(true);
    expect(isValidTimezone('UTC')).toBe(true);
    expect(isValidTimezone('Not/AZone')).toBe(false);
  });
});

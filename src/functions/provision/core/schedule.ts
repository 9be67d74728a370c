/**
 * Schedule expansion.
 *
 * Turns "which weeks of the month, which weekdays, which hours, which
 * timezone" into one RecurrenceSpec per combination. Calendar resolution of
 * "the Nth weekday of the month" is left to the remote scheduler.
 */

import { WEEKDAYS, type RecurrenceSpec, type ScheduleExpansionRequest, type Weekday } from '@shared/types';
import { ConfigurationError } from '@shared/errors';

const MIN_WEEK = 1;
const MAX_WEEK = 5;
const MIN_HOUR = 0;
const MAX_HOUR = 23;

const WEEKDAY_NAMES: Readonly<Record<string, Weekday>> = {
  monday: 'MON',
  tuesday: 'TUE',
  wednesday: 'WED',
  thursday: 'THU',
  friday: 'FRI',
  saturday: 'SAT',
  sunday: 'SUN',
};

/**
 * Parse a weekday given as an abbreviation or full name, case-insensitively.
 *
 * @throws {ConfigurationError} If the value names no weekday
 */
export function parseWeekday(value: string): Weekday {
  const normalized = value.trim().toLowerCase();
  const match =
    WEEKDAYS.find((day) => day.toLowerCase() === normalized) ??
    (Object.hasOwn(WEEKDAY_NAMES, normalized) ? WEEKDAY_NAMES[normalized] : undefined);
  if (!match) {
    throw new ConfigurationError(
      `Invalid weekday '${value}'. Valid weekdays: ${WEEKDAYS.join(', ')}`
    );
  }
  return match;
}

/**
 * Check a timezone name against the runtime's IANA database.
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function uniqueIntegersInRange(
  values: Iterable<number>,
  label: string,
  min: number,
  max: number
): number[] {
  const unique = [...new Set(values)];
  if (unique.length === 0) {
    throw new ConfigurationError(`At least one ${label} is required`);
  }
  for (const value of unique) {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new ConfigurationError(`Invalid ${label} ${value}: must be an integer from ${min} to ${max}`);
    }
  }
  return unique.sort((a, b) => a - b);
}

/**
 * Expand a schedule request into the full set of recurrence specs.
 *
 * Output is grouped by week ordinal ascending: every week-1 spec precedes every
 * week-2 spec. Within one week the (weekday, hour) order is not part of the
 * contract.
 *
 * @throws {ConfigurationError} If any set is empty, or a week, hour, weekday or timezone is invalid
 */
export function expand(request: ScheduleExpansionRequest): RecurrenceSpec[] {
  const weeks = uniqueIntegersInRange(request.weeks, 'week', MIN_WEEK, MAX_WEEK);
  const hours = uniqueIntegersInRange(request.hours, 'hour', MIN_HOUR, MAX_HOUR);

  const requestedDays = new Set<string>(request.weekdays);
  if (requestedDays.size === 0) {
    throw new ConfigurationError('At least one weekday is required');
  }
  const weekdays = WEEKDAYS.filter((day) => requestedDays.has(day));
  if (weekdays.length !== requestedDays.size) {
    const unknown = [...requestedDays].filter((day) => !WEEKDAYS.some((known) => known === day));
    throw new ConfigurationError(`Invalid weekday(s): ${unknown.join(', ')}`);
  }

  const { timezone } = request;
  if (timezone !== undefined && !isValidTimezone(timezone)) {
    throw new ConfigurationError(`Invalid timezone '${timezone}'`);
  }

  const specs: RecurrenceSpec[] = [];
  for (const weekOrdinal of weeks) {
    for (const weekday of weekdays) {
      for (const hour of hours) {
        specs.push(
          Object.freeze(
            timezone === undefined
              ? { weekOrdinal, weekday, hour }
              : { weekOrdinal, weekday, hour, timezone }
          )
        );
      }
    }
  }

  return specs;
}

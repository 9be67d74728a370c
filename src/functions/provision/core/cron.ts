/**
 * Maintenance window wire encoding.
 *
 * SSM evaluates schedules as six-field cron expressions
 * (minutes hours day-of-month month day-of-week year), where `TUE#2` means
 * the second Tuesday of the month.
 */

import type { RecurrenceSpec } from '@shared/types';

function twoDigits(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * @example toScheduleExpression({ weekOrdinal: 2, weekday: 'TUE', hour: 3 }) // "cron(0 3 ? * TUE#2 *)"
 */
export function toScheduleExpression(spec: RecurrenceSpec): string {
  return `cron(0 ${spec.hour} ? * ${spec.weekday}#${spec.weekOrdinal} *)`;
}

/**
 * @example toWindowName({ weekOrdinal: 1, weekday: 'WED', hour: 4 }, 'patching') // "patching-week1-wed-0400"
 */
export function toWindowName(spec: RecurrenceSpec, prefix: string): string {
  return `${prefix}-week${spec.weekOrdinal}-${spec.weekday.toLowerCase()}-${twoDigits(spec.hour)}00`;
}

/**
 * SSM rejects window descriptions longer than this.
 */
export const MAX_DESCRIPTION_LENGTH = 128;

/**
 * Human-readable window description. A long patch group is shortened with an
 * ellipsis so the schedule part always fits.
 */
export function toWindowDescription(spec: RecurrenceSpec, patchGroup: string): string {
  const zone = spec.timezone ?? 'UTC';
  const head = 'Patch group ';
  const tail = `: ${spec.weekday} #${spec.weekOrdinal} of the month at ${twoDigits(spec.hour)}:00 ${zone}`;

  const full = `${head}${patchGroup}${tail}`;
  if (full.length <= MAX_DESCRIPTION_LENGTH) {
    return full;
  }

  const room = MAX_DESCRIPTION_LENGTH - head.length - tail.length - 3;
  if (room < 1) {
    return full.slice(0, MAX_DESCRIPTION_LENGTH);
  }
  return `${head}${patchGroup.slice(0, room)}...${tail}`;
}

/**
 * Immutable calendar snapshots
 */

import type { EarlyCloseOverride, Holiday } from '@market-hours/contracts';
import type { CalendarSnapshot } from './types.js';

/**
 * Build a frozen snapshot. Later entries for the same date win; callers are
 * expected to pass validated, duplicate-free data.
 */
export function createSnapshot(
  holidays: readonly Holiday[],
  earlyCloses: readonly EarlyCloseOverride[],
  committedAt: string | null = null
): CalendarSnapshot {
  const holidayMap = new Map<string, Holiday>();
  for (const holiday of holidays) {
    holidayMap.set(holiday.date, Object.freeze({ ...holiday }));
  }

  const earlyCloseMap = new Map<string, EarlyCloseOverride>();
  for (const override of earlyCloses) {
    earlyCloseMap.set(override.date, Object.freeze({ ...override }));
  }

  return Object.freeze({
    holidays: holidayMap,
    earlyCloses: earlyCloseMap,
    committedAt,
  });
}

/**
 * Bootstrap snapshot served before any refresh has committed: regular
 * weekday hours, no holidays.
 */
export const EMPTY_SNAPSHOT: CalendarSnapshot = createSnapshot([], [], null);

/**
 * Holidays with `start <= date <= end`, ordered by date. Bounds are optional.
 */
export function listHolidays(snapshot: CalendarSnapshot, start?: string, end?: string): Holiday[] {
  return [...snapshot.holidays.values()]
    .filter((h) => (start === undefined || h.date >= start) && (end === undefined || h.date <= end))
    .sort((a, b) => a.date.localeCompare(b.date));
}

export function listEarlyCloses(
  snapshot: CalendarSnapshot,
  start?: string,
  end?: string
): EarlyCloseOverride[] {
  return [...snapshot.earlyCloses.values()]
    .filter((e) => (start === undefined || e.date >= start) && (end === undefined || e.date <= end))
    .sort((a, b) => a.date.localeCompare(b.date));
}

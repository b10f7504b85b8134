/**
 * Consistency checks applied to an acquired schedule before it may be
 * committed.
 */

import { ValidationError } from '@market-hours/contracts';
import type { EarlyCloseOverride, Holiday, RawScheduleRecord, YearRange } from '@market-hours/contracts';
import {
  REGULAR_CLOSE,
  REGULAR_OPEN,
  isValidDate,
  isValidTimeOfDay,
  isWeekend,
  timeOfDayMs,
} from '@market-hours/sessions-calendar';

export interface ValidatedSchedule {
  holidays: Holiday[];
  earlyCloses: EarlyCloseOverride[];
}

function checkRecord(record: RawScheduleRecord, range: YearRange): string[] {
  const { date } = record;
  if (!isValidDate(date)) {
    return [`${date}: invalid date`];
  }

  const issues: string[] = [];
  const year = Number(date.slice(0, 4));
  if (year < range.startYear || year > range.endYear) {
    issues.push(`${date}: outside ${range.startYear}-${range.endYear}`);
  }
  if (record.name.trim().length === 0) {
    issues.push(`${date}: missing name`);
  }
  // a full closure may be listed on a weekend day; it simply overlaps the weekend
  if (record.closureKind === 'FULL_CLOSURE') {
    if (record.closeTime !== undefined) {
      issues.push(`${date}: full closure must not have a closeTime`);
    }
    return issues;
  }

  if (isWeekend(date)) {
    issues.push(`${date}: early close falls on a weekend`);
  }

  const { closeTime } = record;
  if (closeTime === undefined) {
    issues.push(`${date}: early close requires closeTime`);
  } else if (!isValidTimeOfDay(closeTime)) {
    issues.push(`${date}: closeTime ${closeTime} is not a valid HH:MM time`);
  } else {
    const ms = timeOfDayMs(closeTime);
    if (ms <= timeOfDayMs(REGULAR_OPEN) || ms >= timeOfDayMs(REGULAR_CLOSE)) {
      issues.push(`${date}: closeTime ${closeTime} is outside regular hours (${REGULAR_OPEN}-${REGULAR_CLOSE})`);
    }
  }
  return issues;
}

/**
 * Check an acquired schedule and split it into holidays and early-close
 * overrides.
 *
 * Every issue is collected before failing so one run reports all of them.
 *
 * @throws ValidationError listing every issue found
 *
 * @example
 * ```typescript
 * const { holidays, earlyCloses } = validateSchedule(records, { startYear: 2025, endYear: 2026 });
 * ```
 */
export function validateSchedule(records: readonly RawScheduleRecord[], range: YearRange): ValidatedSchedule {
  const issues: string[] = [];

  if (records.length === 0) {
    issues.push('schedule is empty');
  }

  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.date)) {
      issues.push(`${record.date}: duplicate date`);
    }
    seen.add(record.date);
    issues.push(...checkRecord(record, range));
  }

  if (issues.length > 0) {
    throw new ValidationError(`Schedule failed validation with ${issues.length} issue(s)`, issues, {
      records: records.length,
      range,
    });
  }

  const holidays: Holiday[] = records.map((r) => ({ date: r.date, name: r.name.trim(), closureKind: r.closureKind }));
  const earlyCloses: EarlyCloseOverride[] = [];
  for (const r of records) {
    if (r.closureKind === 'EARLY_CLOSE' && r.closeTime !== undefined) {
      earlyCloses.push({ date: r.date, closeTime: r.closeTime });
    }
  }

  return { holidays, earlyCloses };
}

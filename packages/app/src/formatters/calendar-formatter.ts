/**
 * Text renderers for calendar command output
 */

import type { DaySession, RefreshRecord, SessionState } from '@market-hours/contracts';
import { exchangeClock, weekdayName } from '@market-hours/sessions-calendar';
import type { CalendarRange } from '../services/calendar/types.js';

/**
 * Compact duration, e.g. "1d 2h 5m", "3h 0m", "4m 10s"
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m ${secs}s`;
}

export function describeState(state: SessionState): string {
  switch (state.status) {
    case 'CLOSED_HOLIDAY':
      return `CLOSED_HOLIDAY (${state.name})`;
    case 'CLOSED_EARLY':
      return `CLOSED_EARLY (${state.name}, closed at ${state.closedAt} ET)`;
    default:
      return state.status;
  }
}

/**
 * One line per day: date, weekday, hours in ET, notes
 */
export function formatDaySession(day: DaySession): string {
  const hours =
    day.open && day.close ? `${exchangeClock(day.open)}-${exchangeClock(day.close)} ET` : 'closed';
  return `${day.date} ${weekdayName(day.date)}  ${hours.padEnd(17)}${day.notes}`;
}

export function formatCalendarRange(range: CalendarRange): string {
  if (range.holidays.length === 0) {
    return `No holidays between ${range.start} and ${range.end}`;
  }

  const closeTimes = new Map(range.earlyCloses.map((e) => [e.date, e.closeTime]));
  const lines = [`Holidays ${range.start} to ${range.end} (${range.holidays.length})`];

  for (const holiday of range.holidays) {
    const closeTime = closeTimes.get(holiday.date);
    const kind = closeTime ? `EARLY_CLOSE ${closeTime}` : holiday.closureKind;
    lines.push(`  ${holiday.date}  ${kind.padEnd(18)}${holiday.name}`);
  }

  return lines.join('\n');
}

export function formatRefreshRecord(record: RefreshRecord): string {
  const range = `${record.yearRange.startYear}-${record.yearRange.endYear}`;

  if (record.status === 'SUCCESS') {
    return `Refresh SUCCESS at ${record.runAt}: ${record.recordsIngested} records from ${record.source} for ${range}`;
  }

  return [
    `Refresh FAILURE at ${record.runAt} (${record.errorKind ?? 'UNKNOWN'}) from ${record.source} for ${range}`,
    `  ${record.error ?? 'no error recorded'}`,
  ].join('\n');
}

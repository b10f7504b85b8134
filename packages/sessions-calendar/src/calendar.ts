/**
 * Pure-function session classifier with holiday, early-close and DST awareness
 *
 * Provides deterministic, zero-I/O functions for:
 * - Classifying an instant into a trading-session state
 * - Finding the next open/close boundary
 * - Building per-date and per-week session schedules
 *
 * All functions are pure: same inputs always produce same outputs. The
 * calendar itself is passed in as an immutable snapshot.
 */

import { NoUpcomingSessionError } from '@market-hours/contracts';
import type { BoundaryDirection, DaySession, MarketEvent, SessionState } from '@market-hours/contracts';
import {
  REGULAR_CLOSE,
  REGULAR_OPEN,
  addDays,
  assertDate,
  exchangeDate,
  exchangeInstant,
  isWeekend,
  timeOfDayMs,
  toExchangeTime,
  toInstant,
} from './exchange-time.js';
import type { BoundarySearchOptions, CalendarSnapshot, InstantInput } from './types.js';

export const DEFAULT_LOOKAHEAD_DAYS = 14;

const OPEN_MS = timeOfDayMs(REGULAR_OPEN);

/**
 * Classify an instant against a calendar snapshot.
 *
 * Rules, first match wins:
 * 1. FULL_CLOSURE holiday on the exchange-local date: CLOSED_HOLIDAY
 * 2. Saturday or Sunday: CLOSED_WEEKEND
 * 3. Before 09:30: CLOSED_BEFORE_HOURS
 * 4. At or after the effective close: CLOSED_EARLY when an override applies,
 *    CLOSED_AFTER_HOURS otherwise
 * 5. OPEN
 *
 * @throws InvalidInputError for invalid instants or strings without a zone
 *
 * @example
 * ```typescript
 * classify('2024-07-03T13:30:00-04:00', snapshot);
 * // { status: 'CLOSED_EARLY', name: 'Independence Day Eve', closedAt: '13:00' }
 * ```
 */
export function classify(instant: InstantInput, snapshot: CalendarSnapshot): SessionState {
  const { date, isoWeekday, msOfDay } = toExchangeTime(toInstant(instant));

  const holiday = snapshot.holidays.get(date);
  if (holiday?.closureKind === 'FULL_CLOSURE') {
    return { status: 'CLOSED_HOLIDAY', name: holiday.name };
  }

  if (isoWeekday >= 6) {
    return { status: 'CLOSED_WEEKEND' };
  }

  const earlyClose = snapshot.earlyCloses.get(date);
  const closeTime = earlyClose?.closeTime ?? REGULAR_CLOSE;

  if (msOfDay < OPEN_MS) {
    return { status: 'CLOSED_BEFORE_HOURS' };
  }

  if (msOfDay >= timeOfDayMs(closeTime)) {
    if (earlyClose) {
      return { status: 'CLOSED_EARLY', name: holiday?.name ?? 'Early close', closedAt: closeTime };
    }
    return { status: 'CLOSED_AFTER_HOURS' };
  }

  return { status: 'OPEN' };
}

export function isMarketOpen(instant: InstantInput, snapshot: CalendarSnapshot): boolean {
  return classify(instant, snapshot).status === 'OPEN';
}

/**
 * Session schedule for one exchange-local date
 *
 * @throws InvalidInputError unless `date` is a valid YYYY-MM-DD date
 *
 * @example
 * ```typescript
 * const day = getSessionWindow('2024-11-29', snapshot);
 * // day.close is 18:00 UTC (13:00 ET) on the day after Thanksgiving
 * ```
 */
export function getSessionWindow(date: string, snapshot: CalendarSnapshot): DaySession {
  assertDate(date);
  const holiday = snapshot.holidays.get(date);

  if (holiday?.closureKind === 'FULL_CLOSURE') {
    return {
      date,
      isTradingDay: false,
      open: null,
      close: null,
      isEarlyClose: false,
      holidayName: holiday.name,
      notes: `Market closed for ${holiday.name}`,
    };
  }

  if (isWeekend(date)) {
    return { date, isTradingDay: false, open: null, close: null, isEarlyClose: false, notes: 'Weekend' };
  }

  const earlyClose = snapshot.earlyCloses.get(date);
  const open = exchangeInstant(date, REGULAR_OPEN);

  if (earlyClose) {
    const name = holiday?.name ?? 'Early close';
    return {
      date,
      isTradingDay: true,
      open,
      close: exchangeInstant(date, earlyClose.closeTime),
      isEarlyClose: true,
      holidayName: name,
      notes: `Early close at ${earlyClose.closeTime} ET (${name})`,
    };
  }

  return {
    date,
    isTradingDay: true,
    open,
    close: exchangeInstant(date, REGULAR_CLOSE),
    isEarlyClose: false,
    notes: 'Regular trading hours',
  };
}

/**
 * Seven consecutive daily schedules starting at `startDate`
 */
export function getWeekSchedule(startDate: string, snapshot: CalendarSnapshot): DaySession[] {
  assertDate(startDate);
  return Array.from({ length: 7 }, (_, i) => getSessionWindow(addDays(startDate, i), snapshot));
}

/**
 * First open or close strictly after `instant`.
 *
 * Scans day by day from the instant's exchange-local date, up to
 * `lookaheadDays` days ahead.
 *
 * @throws NoUpcomingSessionError when no boundary exists inside the window
 */
export function nextSessionBoundary(
  instant: InstantInput,
  direction: BoundaryDirection,
  snapshot: CalendarSnapshot,
  options: BoundarySearchOptions = {}
): Date {
  return findNextSession(toInstant(instant), direction, snapshot, options).at;
}

/**
 * Next open or close event relative to `instant`: the close of the current
 * session while the market is open, the next open otherwise.
 */
export function nextMarketEvent(
  instant: InstantInput,
  snapshot: CalendarSnapshot,
  options: BoundarySearchOptions = {}
): MarketEvent {
  const from = toInstant(instant);
  const direction: BoundaryDirection = isMarketOpen(from, snapshot) ? 'NEXT_CLOSE' : 'NEXT_OPEN';
  const { at, session } = findNextSession(from, direction, snapshot, options);

  return {
    type: direction === 'NEXT_CLOSE' ? 'close' : 'open',
    at,
    secondsUntil: Math.floor((at.getTime() - from.getTime()) / 1000),
    date: session.date,
    isEarlyClose: session.isEarlyClose,
    notes: session.notes,
  };
}

function findNextSession(
  from: Date,
  direction: BoundaryDirection,
  snapshot: CalendarSnapshot,
  options: BoundarySearchOptions
): { at: Date; session: DaySession } {
  const lookaheadDays = options.lookaheadDays ?? DEFAULT_LOOKAHEAD_DAYS;
  const startDate = exchangeDate(from);

  for (let offset = 0; offset <= lookaheadDays; offset++) {
    const session = getSessionWindow(addDays(startDate, offset), snapshot);
    const at = direction === 'NEXT_OPEN' ? session.open : session.close;
    if (at && at.getTime() > from.getTime()) {
      return { at, session };
    }
  }

  throw new NoUpcomingSessionError(
    `No ${direction === 'NEXT_OPEN' ? 'open' : 'close'} within ${lookaheadDays} days of ${from.toISOString()}`,
    { from: from.toISOString(), direction, lookaheadDays }
  );
}

/**
 * @fileoverview Calendar domain types shared by the classifier, store,
 * acquisition adapters and refresh pipeline.
 *
 * Dates are exchange-local calendar dates in `YYYY-MM-DD` form and times of
 * day are exchange-local `HH:MM` strings (America/New_York).
 *
 * @module @market-hours/contracts/calendar
 */

/**
 * How a listed holiday affects the trading day.
 *
 * - FULL_CLOSURE: the market does not open at all
 * - EARLY_CLOSE: regular open, earlier-than-normal close
 */
export type ClosureKind = 'FULL_CLOSURE' | 'EARLY_CLOSE';

/**
 * A holiday or half-day entry in the calendar. At most one per date.
 *
 * @example
 * ```typescript
 * const newYear: Holiday = {
 *   date: '2024-01-01',
 *   name: "New Year's Day",
 *   closureKind: 'FULL_CLOSURE',
 * };
 * ```
 */
export interface Holiday {
  /** Exchange-local date (YYYY-MM-DD) */
  date: string;
  /** Display name, e.g. "Thanksgiving Day" */
  name: string;
  closureKind: ClosureKind;
}

/**
 * Closing-time override for an early-close day. Always paired with an
 * EARLY_CLOSE holiday on the same date.
 */
export interface EarlyCloseOverride {
  /** Exchange-local date (YYYY-MM-DD) */
  date: string;
  /** Exchange-local close time (HH:MM), strictly inside regular hours */
  closeTime: string;
}

/**
 * One schedule row as produced by an acquisition adapter, before validation.
 */
export interface RawScheduleRecord {
  date: string;
  name: string;
  closureKind: ClosureKind;
  /** Present for EARLY_CLOSE rows only */
  closeTime?: string;
}

/**
 * Inclusive span of calendar years covered by a refresh.
 */
export interface YearRange {
  startYear: number;
  endYear: number;
}

/**
 * Trading-session state of an instant. Discriminated on `status`.
 */
export type SessionState =
  | { status: 'OPEN' }
  | { status: 'CLOSED_WEEKEND' }
  | { status: 'CLOSED_HOLIDAY'; name: string }
  | { status: 'CLOSED_BEFORE_HOURS' }
  | { status: 'CLOSED_AFTER_HOURS' }
  | { status: 'CLOSED_EARLY'; name: string; closedAt: string };

export type SessionStatus = SessionState['status'];

/**
 * Which boundary `nextSessionBoundary` searches for.
 */
export type BoundaryDirection = 'NEXT_OPEN' | 'NEXT_CLOSE';

/**
 * Schedule of a single exchange-local date.
 */
export interface DaySession {
  date: string;
  isTradingDay: boolean;
  /** Session open (UTC instant), null on closed days */
  open: Date | null;
  /** Session close (UTC instant), null on closed days */
  close: Date | null;
  isEarlyClose: boolean;
  holidayName?: string;
  notes: string;
}

/**
 * Next open or close transition relative to a reference instant.
 */
export interface MarketEvent {
  type: 'open' | 'close';
  at: Date;
  secondsUntil: number;
  /** Exchange-local date the event falls on */
  date: string;
  isEarlyClose: boolean;
  notes: string;
}

export type RefreshStatus = 'SUCCESS' | 'FAILURE';

/**
 * Failure category recorded with a FAILURE refresh record.
 */
export type RefreshErrorKind = 'ACQUISITION' | 'PARSE' | 'VALIDATION' | 'STORE' | 'UNKNOWN';

/**
 * Audit entry appended by every refresh cycle attempt.
 */
export interface RefreshRecord {
  /** Row id, absent when the record could not be persisted */
  id?: number;
  /** ISO 8601 timestamp of the attempt */
  runAt: string;
  status: RefreshStatus;
  recordsIngested: number;
  error?: string;
  errorKind?: RefreshErrorKind;
  /** Acquisition source name, e.g. "nyse" */
  source: string;
  yearRange: YearRange;
}

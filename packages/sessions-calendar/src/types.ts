/**
 * Type definitions for sessions-calendar package
 */

import type { EarlyCloseOverride, Holiday } from '@market-hours/contracts';

/**
 * Immutable view of the committed calendar. Readers hold a reference to one
 * snapshot; a refresh publishes a new one instead of mutating this.
 */
export interface CalendarSnapshot {
  /** Holidays keyed by exchange-local date (YYYY-MM-DD) */
  readonly holidays: ReadonlyMap<string, Holiday>;

  /** Early-close overrides keyed by exchange-local date */
  readonly earlyCloses: ReadonlyMap<string, EarlyCloseOverride>;

  /** ISO timestamp of the commit that produced this snapshot, null before the first one */
  readonly committedAt: string | null;
}

/**
 * Anything the classifier accepts as an instant: a Date, epoch milliseconds,
 * or an ISO 8601 string carrying `Z` or an explicit offset.
 */
export type InstantInput = Date | number | string;

export interface BoundarySearchOptions {
  /** Days to scan forward before giving up (default 14) */
  lookaheadDays?: number;
}

/**
 * Wall-clock breakdown of an instant in the exchange time zone
 */
export interface ExchangeTime {
  /** Exchange-local date (YYYY-MM-DD) */
  date: string;

  /** ISO weekday, 1 = Monday ... 7 = Sunday */
  isoWeekday: number;

  /** Milliseconds since local midnight on the wall clock */
  msOfDay: number;
}

/**
 * Exchange time zone helpers (America/New_York, DST-aware via moment-timezone)
 */

import moment from 'moment-timezone';
import { InvalidInputError } from '@market-hours/contracts';
import type { ExchangeTime, InstantInput } from './types.js';

export const EXCHANGE_TIMEZONE = 'America/New_York';
export const REGULAR_OPEN = '09:30';
export const REGULAR_CLOSE = '16:00';

const DATE_FORMAT = 'YYYY-MM-DD';
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const ZONED_ISO_PATTERN = /T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalize a classifier input to a Date.
 *
 * Strings must be ISO 8601 with a time zone designator; a bare local time
 * cannot be placed on the exchange clock.
 *
 * @throws InvalidInputError when the value is not a valid instant
 */
export function toInstant(input: InstantInput): Date {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new InvalidInputError('Invalid Date instance', { input: String(input) });
    }
    return new Date(input.getTime());
  }

  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new InvalidInputError('Epoch milliseconds must be a finite number', { input });
    }
    return new Date(input);
  }

  if (!ZONED_ISO_PATTERN.test(input)) {
    throw new InvalidInputError(`Instant has no resolvable time zone: ${input}`, { input });
  }

  const parsed = moment(input, moment.ISO_8601, true);
  if (!parsed.isValid()) {
    throw new InvalidInputError(`Not a valid ISO 8601 instant: ${input}`, { input });
  }
  return parsed.toDate();
}

export function toExchangeTime(instant: Date): ExchangeTime {
  const local = moment.tz(instant, EXCHANGE_TIMEZONE);
  return {
    date: local.format(DATE_FORMAT),
    isoWeekday: local.isoWeekday(),
    msOfDay:
      local.hours() * 3_600_000 + local.minutes() * 60_000 + local.seconds() * 1000 + local.milliseconds(),
  };
}

/**
 * Milliseconds since midnight for an `HH:MM` time of day
 */
export function timeOfDayMs(time: string): number {
  const match = TIME_PATTERN.exec(time);
  if (!match) {
    throw new InvalidInputError(`Invalid time of day: ${time}`, { input: time });
  }
  return Number(match[1]) * 3_600_000 + Number(match[2]) * 60_000;
}

export function isValidTimeOfDay(time: string): boolean {
  return TIME_PATTERN.test(time);
}

export function isValidDate(date: string): boolean {
  return moment(date, DATE_FORMAT, true).isValid();
}

/**
 * @throws InvalidInputError unless `date` is a real YYYY-MM-DD calendar date
 */
export function assertDate(date: string): void {
  if (!isValidDate(date)) {
    throw new InvalidInputError(`Invalid calendar date: ${date}`, { input: date });
  }
}

export function isWeekend(date: string): boolean {
  return moment(date, DATE_FORMAT, true).isoWeekday() >= 6;
}

/**
 * UTC instant of an exchange-local wall-clock time on a date
 */
export function exchangeInstant(date: string, time: string): Date {
  return moment.tz(`${date} ${time}`, `${DATE_FORMAT} HH:mm`, EXCHANGE_TIMEZONE).toDate();
}

export function addDays(date: string, days: number): string {
  return moment(date, DATE_FORMAT, true).add(days, 'days').format(DATE_FORMAT);
}

/**
 * Exchange-local date of an instant
 */
export function exchangeDate(instant: Date): string {
  return moment.tz(instant, EXCHANGE_TIMEZONE).format(DATE_FORMAT);
}

export function exchangeYear(instant: Date): number {
  return moment.tz(instant, EXCHANGE_TIMEZONE).year();
}

/**
 * Exchange-local wall-clock time of an instant (HH:MM)
 */
export function exchangeClock(instant: Date): string {
  return moment.tz(instant, EXCHANGE_TIMEZONE).format('HH:mm');
}

/**
 * Short weekday name of a calendar date, e.g. "Mon"
 */
export function weekdayName(date: string): string {
  return moment(date, DATE_FORMAT, true).format('ddd');
}

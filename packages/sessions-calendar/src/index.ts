/**
 * @market-hours/sessions-calendar
 *
 * Session classifier and immutable calendar snapshots for US equity markets
 */

export {
  classify,
  isMarketOpen,
  getSessionWindow,
  getWeekSchedule,
  nextSessionBoundary,
  nextMarketEvent,
  DEFAULT_LOOKAHEAD_DAYS,
} from './calendar.js';

export { createSnapshot, EMPTY_SNAPSHOT, listHolidays, listEarlyCloses } from './snapshot.js';

export {
  EXCHANGE_TIMEZONE,
  REGULAR_OPEN,
  REGULAR_CLOSE,
  toInstant,
  toExchangeTime,
  timeOfDayMs,
  isValidTimeOfDay,
  isValidDate,
  assertDate,
  isWeekend,
  exchangeInstant,
  exchangeDate,
  exchangeYear,
  addDays,
  exchangeClock,
  weekdayName,
} from './exchange-time.js';

export type { CalendarSnapshot, InstantInput, BoundarySearchOptions, ExchangeTime } from './types.js';

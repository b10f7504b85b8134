/**
 * @fileoverview Main entry point for @market-hours/contracts.
 *
 * Domain types and error classes shared across the calendar packages.
 *
 * @module @market-hours/contracts
 */

// Calendar domain types
export type {
  ClosureKind,
  Holiday,
  EarlyCloseOverride,
  RawScheduleRecord,
  YearRange,
  SessionState,
  SessionStatus,
  BoundaryDirection,
  DaySession,
  MarketEvent,
  RefreshStatus,
  RefreshErrorKind,
  RefreshRecord,
} from './calendar.js';

// Error classes and guards
export {
  CalendarError,
  InvalidInputError,
  NoUpcomingSessionError,
  AcquisitionError,
  ParseError,
  ValidationError,
  StoreError,
  SchedulerStoppedError,
  isCalendarError,
  isInvalidInputError,
  isNoUpcomingSessionError,
  isAcquisitionError,
  isParseError,
  isValidationError,
  isStoreError,
} from './errors.js';

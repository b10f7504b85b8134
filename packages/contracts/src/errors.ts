/**
 * @fileoverview Error taxonomy for the market hours calendar.
 *
 * Every error extends CalendarError and carries:
 * - a machine-readable code
 * - a structured data payload
 * - an ISO timestamp
 *
 * Query-time errors (InvalidInputError, NoUpcomingSessionError) reach the
 * caller. Refresh-time errors (acquisition, parse, validation, store) are
 * absorbed by the refresh orchestrator into a FAILURE record.
 *
 * @module @market-hours/contracts/errors
 */

/**
 * Base error class for all calendar errors.
 *
 * @example
 * ```typescript
 * throw new CalendarError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class CalendarError extends Error {
  /**
   * Machine-readable error code (e.g., 'ACQUISITION_FAILED').
   */
  readonly code: string;

  /**
   * Structured error data for debugging and logging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'CalendarError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Bad instant or unresolvable time zone passed to the classifier.
 */
export class InvalidInputError extends CalendarError {
  constructor(message: string, data?: { input?: unknown; [key: string]: unknown }) {
    super('INVALID_INPUT', message, data);
    this.name = 'InvalidInputError';
  }
}

/**
 * Boundary search ran past its lookahead bound. Usually a data gap, e.g. the
 * next year's schedule missing near year end.
 */
export class NoUpcomingSessionError extends CalendarError {
  constructor(
    message: string,
    data: { from: string; direction: string; lookaheadDays: number; [key: string]: unknown }
  ) {
    super('NO_UPCOMING_SESSION', message, data);
    this.name = 'NoUpcomingSessionError';
  }
}

/**
 * Transient network or upstream failure while fetching the schedule.
 *
 * @example
 * ```typescript
 * throw new AcquisitionError('Schedule request timed out', {
 *   source: 'nyse',
 *   reason: 'timeout',
 *   timeoutMs: 30000,
 * });
 * ```
 */
export class AcquisitionError extends CalendarError {
  /** HTTP status when the upstream answered with a non-2xx response */
  readonly statusCode?: number;

  constructor(
    message: string,
    data: {
      source: string;
      reason: 'timeout' | 'network' | 'http_status' | 'io';
      statusCode?: number;
      requestUrl?: string;
      [key: string]: unknown;
    }
  ) {
    super('ACQUISITION_FAILED', message, data);
    this.name = 'AcquisitionError';
    this.statusCode = data.statusCode;
  }
}

/**
 * Upstream data has a shape the adapter does not recognize. Needs operator
 * attention; retrying will not help.
 */
export class ParseError extends CalendarError {
  constructor(
    message: string,
    data?: {
      source?: string;
      field?: string;
      value?: string;
      [key: string]: unknown;
    }
  ) {
    super('SCHEDULE_PARSE_FAILED', message, data);
    this.name = 'ParseError';
  }
}

/**
 * Fetched schedule is internally inconsistent. The refresh cycle is aborted
 * and the store is left untouched.
 */
export class ValidationError extends CalendarError {
  readonly issues: string[];

  constructor(message: string, issues: string[], data?: Record<string, unknown>) {
    super('SCHEDULE_VALIDATION_FAILED', message, { ...data, issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Persistence failure while committing or reading the calendar.
 */
export class StoreError extends CalendarError {
  constructor(message: string, data?: { operation?: string; [key: string]: unknown }) {
    super('STORE_FAILURE', message, data);
    this.name = 'StoreError';
  }
}

/**
 * The scheduler was stopped and no longer accepts triggers.
 */
export class SchedulerStoppedError extends CalendarError {
  constructor() {
    super('SCHEDULER_STOPPED', 'Refresh scheduler has been stopped');
    this.name = 'SchedulerStoppedError';
  }
}

export function isCalendarError(error: unknown): error is CalendarError {
  return error instanceof CalendarError;
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

export function isNoUpcomingSessionError(error: unknown): error is NoUpcomingSessionError {
  return error instanceof NoUpcomingSessionError;
}

export function isAcquisitionError(error: unknown): error is AcquisitionError {
  return error instanceof AcquisitionError;
}

/**
 * Type guard for ParseError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isParseError(err)) {
 *     logger.error('Schedule format changed upstream', { error: err });
 *   }
 * }
 * ```
 */
export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

/**
 * @fileoverview Tests for calendar error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  CalendarError,
  AcquisitionError,
  ParseError,
  ValidationError,
  NoUpcomingSessionError,
  InvalidInputError,
  SchedulerStoppedError,
  isCalendarError,
  isAcquisitionError,
  isParseError,
  isValidationError,
} from '../src/errors.js';

describe('CalendarError', () => {
  it('should create error with code and message', () => {
    const error = new CalendarError('TEST_CODE', 'Test message');

    expect(error.name).toBe('CalendarError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.stack).toBeDefined();
  });

  it('should have valid ISO timestamp', () => {
    const error = new CalendarError('TEST_CODE', 'Test message');

    expect(new Date(error.timestamp).toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new CalendarError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('CalendarError');
    expect(parsed.code).toBe('TEST_CODE');
    expect(parsed.message).toBe('Test message');
    expect(parsed.data).toEqual({ key: 'value' });
    expect(parsed.timestamp).toBe(error.timestamp);
  });
});

describe('AcquisitionError', () => {
  it('should carry source, reason and status code', () => {
    const error = new AcquisitionError('Upstream returned 503', {
      source: 'nyse',
      reason: 'http_status',
      statusCode: 503,
    });

    expect(error.name).toBe('AcquisitionError');
    expect(error.code).toBe('ACQUISITION_FAILED');
    expect(error.statusCode).toBe(503);
    expect(error.data?.['source']).toBe('nyse');
    expect(error.data?.['reason']).toBe('http_status');
  });

  it('should be distinguishable from ParseError', () => {
    const acquisition = new AcquisitionError('timed out', { source: 'nyse', reason: 'timeout' });
    const parse = new ParseError('no holiday table', { source: 'nyse' });

    expect(isAcquisitionError(acquisition)).toBe(true);
    expect(isParseError(acquisition)).toBe(false);
    expect(isParseError(parse)).toBe(true);
    expect(isAcquisitionError(parse)).toBe(false);
    expect(parse.code).toBe('SCHEDULE_PARSE_FAILED');
  });
});

describe('ValidationError', () => {
  it('should expose issues directly and in data', () => {
    const issues = ['duplicate date 2025-01-01', 'missing close time for 2025-07-03'];
    const error = new ValidationError('Schedule failed validation', issues, { count: 2 });

    expect(error.issues).toEqual(issues);
    expect(error.data).toEqual({ count: 2, issues });
    expect(isValidationError(error)).toBe(true);
  });
});

describe('query-time errors', () => {
  it('should create NoUpcomingSessionError with search context', () => {
    const error = new NoUpcomingSessionError('No open within 14 days', {
      from: '2025-12-20T12:00:00.000Z',
      direction: 'NEXT_OPEN',
      lookaheadDays: 14,
    });

    expect(error.code).toBe('NO_UPCOMING_SESSION');
    expect(error.data?.['lookaheadDays']).toBe(14);
  });

  it('should create InvalidInputError', () => {
    const error = new InvalidInputError('Instant has no time zone', { input: '2025-01-02T10:00' });

    expect(error.code).toBe('INVALID_INPUT');
    expect(error).toBeInstanceOf(CalendarError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should create SchedulerStoppedError', () => {
    const error = new SchedulerStoppedError();

    expect(error.code).toBe('SCHEDULER_STOPPED');
    expect(isCalendarError(error)).toBe(true);
  });
});

describe('isCalendarError', () => {
  it('should reject plain errors and non-errors', () => {
    expect(isCalendarError(new Error('plain'))).toBe(false);
    expect(isCalendarError('CALENDAR')).toBe(false);
    expect(isCalendarError(null)).toBe(false);
  });
});

/**
 * Tests for the session classifier and boundary search
 */

import { describe, it, expect } from 'vitest';
import { InvalidInputError, NoUpcomingSessionError } from '@market-hours/contracts';
import type { EarlyCloseOverride, Holiday } from '@market-hours/contracts';
import {
  classify,
  isMarketOpen,
  getSessionWindow,
  getWeekSchedule,
  nextSessionBoundary,
  nextMarketEvent,
  createSnapshot,
  EMPTY_SNAPSHOT,
  listHolidays,
  exchangeClock,
  weekdayName,
} from '../src/index.js';

const HOLIDAYS: Holiday[] = [
  { date: '2024-01-01', name: "New Year's Day", closureKind: 'FULL_CLOSURE' },
  { date: '2024-07-03', name: 'Independence Day Eve', closureKind: 'EARLY_CLOSE' },
  { date: '2024-07-04', name: 'Independence Day', closureKind: 'FULL_CLOSURE' },
  { date: '2024-11-29', name: 'Day after Thanksgiving', closureKind: 'EARLY_CLOSE' },
];

const EARLY_CLOSES: EarlyCloseOverride[] = [
  { date: '2024-07-03', closeTime: '13:00' },
  { date: '2024-11-29', closeTime: '13:00' },
];

const snapshot = createSnapshot(HOLIDAYS, EARLY_CLOSES, '2024-01-01T06:00:00.000Z');

const HOUR = 3_600_000;

describe('classify', () => {
  it('should report the holiday name on New Year’s Day', () => {
    expect(classify('2024-01-01T12:00:00-05:00', snapshot)).toEqual({
      status: 'CLOSED_HOLIDAY',
      name: "New Year's Day",
    });
  });

  it('should close early on Independence Day Eve', () => {
    expect(classify('2024-07-03T13:30:00-04:00', snapshot)).toEqual({
      status: 'CLOSED_EARLY',
      name: 'Independence Day Eve',
      closedAt: '13:00',
    });
    expect(classify('2024-07-03T12:00:00-04:00', snapshot)).toEqual({ status: 'OPEN' });
  });

  it('should apply open and early-close edges exactly', () => {
    expect(classify('2024-07-03T09:29:00-04:00', snapshot).status).toBe('CLOSED_BEFORE_HOURS');
    expect(classify('2024-07-03T09:30:00-04:00', snapshot).status).toBe('OPEN');
    expect(classify('2024-07-03T12:59:59.999-04:00', snapshot).status).toBe('OPEN');
    expect(classify('2024-07-03T13:00:00-04:00', snapshot).status).toBe('CLOSED_EARLY');
  });

  it('should apply regular open and close edges', () => {
    expect(classify('2024-01-02T14:29:59.999Z', snapshot).status).toBe('CLOSED_BEFORE_HOURS');
    expect(classify('2024-01-02T14:30:00.000Z', snapshot).status).toBe('OPEN');
    expect(classify('2024-01-02T20:59:59.999Z', snapshot).status).toBe('OPEN');
    expect(classify('2024-01-02T21:00:00.000Z', snapshot).status).toBe('CLOSED_AFTER_HOURS');
  });

  it('should return CLOSED_WEEKEND for every instant of a weekend', () => {
    const weekendSnapshot = createSnapshot(
      [{ date: '2024-01-06', name: 'Stray half day', closureKind: 'EARLY_CLOSE' }],
      [{ date: '2024-01-06', closeTime: '13:00' }]
    );
    // Saturday 2024-01-06 00:00 ET
    const start = Date.parse('2024-01-06T05:00:00Z');

    for (let i = 0; i < 48 * 4; i++) {
      const t = start + i * 15 * 60_000;
      expect(classify(t, weekendSnapshot)).toEqual({ status: 'CLOSED_WEEKEND' });
    }
  });

  it('should return CLOSED_HOLIDAY for every instant of a full closure', () => {
    const start = Date.parse('2024-01-01T05:00:00Z');

    for (let i = 0; i < 48; i++) {
      expect(classify(start + i * 30 * 60_000, snapshot).status).toBe('CLOSED_HOLIDAY');
    }
  });

  it('should accept Date and epoch millisecond inputs', () => {
    expect(classify(new Date('2024-01-02T15:00:00Z'), snapshot)).toEqual({ status: 'OPEN' });
    expect(classify(Date.UTC(2024, 0, 2, 15, 0), snapshot)).toEqual({ status: 'OPEN' });
  });

  it('should follow DST transitions', () => {
    // 2024-03-11 is the first Monday on EDT: open is 13:30Z, not 14:30Z
    expect(classify('2024-03-11T13:30:00Z', snapshot).status).toBe('OPEN');
    expect(classify('2024-03-08T14:00:00Z', snapshot).status).toBe('CLOSED_BEFORE_HOURS');
  });

  it('should use regular hours with the empty snapshot', () => {
    expect(classify('2024-01-01T12:00:00-05:00', EMPTY_SNAPSHOT)).toEqual({ status: 'OPEN' });
  });

  it('should reject instants without a zone or with invalid values', () => {
    expect(() => classify('2024-01-02T10:00:00', snapshot)).toThrow(InvalidInputError);
    expect(() => classify('not a date', snapshot)).toThrow(InvalidInputError);
    expect(() => classify('2024-13-01T10:00:00Z', snapshot)).toThrow(InvalidInputError);
    expect(() => classify(Number.NaN, snapshot)).toThrow(InvalidInputError);
    expect(() => classify(new Date('garbage'), snapshot)).toThrow(InvalidInputError);
  });
});

describe('isMarketOpen', () => {
  it('should be true only while OPEN', () => {
    expect(isMarketOpen('2024-01-02T15:00:00Z', snapshot)).toBe(true);
    expect(isMarketOpen('2024-01-01T15:00:00Z', snapshot)).toBe(false);
  });
});

describe('getSessionWindow', () => {
  it('should build an early-close day', () => {
    const day = getSessionWindow('2024-11-29', snapshot);

    expect(day.isTradingDay).toBe(true);
    expect(day.open?.toISOString()).toBe('2024-11-29T14:30:00.000Z');
    expect(day.close?.toISOString()).toBe('2024-11-29T18:00:00.000Z');
    expect(day.isEarlyClose).toBe(true);
    expect(day.holidayName).toBe('Day after Thanksgiving');
    expect(day.notes).toBe('Early close at 13:00 ET (Day after Thanksgiving)');
  });

  it('should build closed days', () => {
    expect(getSessionWindow('2024-07-04', snapshot)).toEqual({
      date: '2024-07-04',
      isTradingDay: false,
      open: null,
      close: null,
      isEarlyClose: false,
      holidayName: 'Independence Day',
      notes: 'Market closed for Independence Day',
    });
    expect(getSessionWindow('2024-07-06', snapshot).notes).toBe('Weekend');
  });

  it('should reject malformed dates', () => {
    expect(() => getSessionWindow('2024-02-30', snapshot)).toThrow(InvalidInputError);
  });
});

describe('getWeekSchedule', () => {
  it('should return seven consecutive days', () => {
    const week = getWeekSchedule('2024-07-01', snapshot);

    expect(week.map((d) => d.date)).toEqual([
      '2024-07-01',
      '2024-07-02',
      '2024-07-03',
      '2024-07-04',
      '2024-07-05',
      '2024-07-06',
      '2024-07-07',
    ]);
    expect(week.map((d) => d.isTradingDay)).toEqual([true, true, true, false, true, false, false]);
    expect(week[2]?.isEarlyClose).toBe(true);
  });
});

describe('nextSessionBoundary', () => {
  it('should skip holidays and weekends', () => {
    expect(nextSessionBoundary('2024-01-01T17:00:00Z', 'NEXT_OPEN', snapshot).toISOString()).toBe(
      '2024-01-02T14:30:00.000Z'
    );
    expect(nextSessionBoundary('2024-01-01T17:00:00Z', 'NEXT_CLOSE', snapshot).toISOString()).toBe(
      '2024-01-02T21:00:00.000Z'
    );
    expect(nextSessionBoundary('2024-01-05T22:00:00Z', 'NEXT_OPEN', snapshot).toISOString()).toBe(
      '2024-01-08T14:30:00.000Z'
    );
  });

  it('should return a boundary strictly after the instant', () => {
    expect(nextSessionBoundary('2024-01-02T14:30:00Z', 'NEXT_OPEN', snapshot).toISOString()).toBe(
      '2024-01-03T14:30:00.000Z'
    );
  });

  it('should use the early close time', () => {
    expect(nextSessionBoundary('2024-07-03T16:00:00Z', 'NEXT_CLOSE', snapshot).toISOString()).toBe(
      '2024-07-03T17:00:00.000Z'
    );
  });

  it('should cross the spring DST change', () => {
    expect(nextSessionBoundary('2024-03-08T22:00:00Z', 'NEXT_OPEN', snapshot).toISOString()).toBe(
      '2024-03-11T13:30:00.000Z'
    );
  });

  it('should advance strictly under repeated application', () => {
    for (const direction of ['NEXT_OPEN', 'NEXT_CLOSE'] as const) {
      let t = new Date('2024-06-28T12:00:00Z');
      for (let i = 0; i < 10; i++) {
        const next = nextSessionBoundary(t, direction, snapshot);
        expect(next.getTime()).toBeGreaterThan(t.getTime());
        t = next;
      }
    }
  });

  it('should fail past the lookahead bound', () => {
    expect(() =>
      nextSessionBoundary('2024-01-05T22:00:00Z', 'NEXT_OPEN', snapshot, { lookaheadDays: 2 })
    ).toThrow(NoUpcomingSessionError);
  });
});

describe('nextMarketEvent', () => {
  it('should report the close while open', () => {
    const event = nextMarketEvent('2024-07-03T16:00:00Z', snapshot);

    expect(event).toEqual({
      type: 'close',
      at: new Date('2024-07-03T17:00:00Z'),
      secondsUntil: HOUR / 1000,
      date: '2024-07-03',
      isEarlyClose: true,
      notes: 'Early close at 13:00 ET (Independence Day Eve)',
    });
  });

  it('should report the next open while closed', () => {
    const event = nextMarketEvent('2024-07-03T17:30:00Z', snapshot);

    expect(event.type).toBe('open');
    expect(event.at.toISOString()).toBe('2024-07-05T13:30:00.000Z');
    expect(event.secondsUntil).toBe(44 * 3600);
    expect(event.notes).toBe('Regular trading hours');
  });
});

describe('snapshots', () => {
  it('should be frozen', () => {
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.holidays.get('2024-01-01'))).toBe(true);
    expect(snapshot.committedAt).toBe('2024-01-01T06:00:00.000Z');
    expect(EMPTY_SNAPSHOT.committedAt).toBeNull();
  });

  it('should list holidays in date order within bounds', () => {
    expect(listHolidays(snapshot, '2024-07-01', '2024-07-31').map((h) => h.date)).toEqual([
      '2024-07-03',
      '2024-07-04',
    ]);
    expect(listHolidays(snapshot)).toHaveLength(4);
  });
});

describe('exchange clock formatting', () => {
  it('renders instants on the New York wall clock across DST', () => {
    expect(exchangeClock(new Date('2024-07-03T17:00:00Z'))).toBe('13:00');
    expect(exchangeClock(new Date('2024-01-02T14:30:00Z'))).toBe('09:30');
  });

  it('names the weekday of a calendar date', () => {
    expect(weekdayName('2024-11-28')).toBe('Thu');
    expect(weekdayName('2024-07-06')).toBe('Sat');
  });
});

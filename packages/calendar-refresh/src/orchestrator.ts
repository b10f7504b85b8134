/**
 * Refresh cycle: acquire -> validate -> commit -> record.
 *
 * Every failure ends as a FAILURE RefreshRecord; nothing thrown by a cycle
 * reaches the scheduler or the query path, and the previously published
 * calendar stays in force.
 */

import {
  isAcquisitionError,
  isParseError,
  isStoreError,
  isValidationError,
} from '@market-hours/contracts';
import type {
  EarlyCloseOverride,
  Holiday,
  RefreshErrorKind,
  RefreshRecord,
  YearRange,
} from '@market-hours/contracts';
import { startTimer, withJobRequestContext } from '@market-hours/logger';
import type { Logger } from '@market-hours/logger';
import type { ScheduleSource } from '@market-hours/provider-nyse';
import { exchangeYear } from '@market-hours/sessions-calendar';
import { validateSchedule } from './validate.js';

/**
 * The parts of the calendar store a refresh cycle writes to.
 */
export interface RefreshStore {
  replaceRange(
    range: YearRange,
    holidays: readonly Holiday[],
    earlyCloses: readonly EarlyCloseOverride[],
    committedAt?: string
  ): Promise<unknown>;
  appendRefreshRecord(record: RefreshRecord): Promise<RefreshRecord>;
}

export interface RefreshOrchestratorOptions {
  store: RefreshStore;
  source: ScheduleSource;
  logger: Logger;
  /** Following years fetched along with the current one (default 1) */
  yearsAhead?: number;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export function refreshErrorKind(error: unknown): RefreshErrorKind {
  if (isAcquisitionError(error)) return 'ACQUISITION';
  if (isParseError(error)) return 'PARSE';
  if (isValidationError(error)) return 'VALIDATION';
  if (isStoreError(error)) return 'STORE';
  return 'UNKNOWN';
}

function describeError(error: unknown): string {
  if (isValidationError(error)) {
    return `${error.message}: ${error.issues.join('; ')}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class RefreshOrchestrator {
  private readonly store: RefreshStore;
  private readonly source: ScheduleSource;
  private readonly logger: Logger;
  private readonly yearsAhead: number;
  private readonly now: () => Date;

  constructor(options: RefreshOrchestratorOptions) {
    this.store = options.store;
    this.source = options.source;
    this.logger = options.logger.child({ component: 'refresh' });
    this.yearsAhead = options.yearsAhead ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Year range a cycle started at `at` covers: the current exchange-local
   * year plus `yearsAhead` following years.
   */
  yearRangeAt(at: Date): YearRange {
    const year = exchangeYear(at);
    return { startYear: year, endYear: year + this.yearsAhead };
  }

  /**
   * Run one refresh cycle. Never rejects.
   */
  async runRefreshCycle(): Promise<RefreshRecord> {
    return withJobRequestContext('calendar-refresh', { source: this.source.name })(() => this.cycle());
  }

  private async cycle(): Promise<RefreshRecord> {
    const timer = startTimer();
    const runAt = this.now();
    const range = this.yearRangeAt(runAt);
    const base = { runAt: runAt.toISOString(), source: this.source.name, yearRange: range };

    this.logger.info('Refresh cycle started', { source: this.source.name, range });

    let record: RefreshRecord;
    try {
      const raw = await this.source.fetchSchedule(range);
      const { holidays, earlyCloses } = validateSchedule(raw, range);
      await this.store.replaceRange(range, holidays, earlyCloses, base.runAt);

      record = { ...base, status: 'SUCCESS', recordsIngested: raw.length };
      this.logger.info('Refresh cycle succeeded', {
        range,
        recordsIngested: raw.length,
        holidays: holidays.length,
        earlyCloses: earlyCloses.length,
        duration_ms: timer.stop(),
      });
    } catch (error) {
      const errorKind = refreshErrorKind(error);
      record = { ...base, status: 'FAILURE', recordsIngested: 0, error: describeError(error), errorKind };
      this.logFailure(errorKind, error, range, timer.stop());
    }

    return this.persist(record);
  }

  private logFailure(kind: RefreshErrorKind, error: unknown, range: YearRange, durationMs: number): void {
    const meta = { errorKind: kind, range, source: this.source.name, duration_ms: durationMs, error };

    switch (kind) {
      case 'ACQUISITION':
        this.logger.warn('Refresh cycle failed to acquire schedule; keeping current calendar', meta);
        break;
      case 'PARSE':
        this.logger.error('Upstream schedule format not recognized; operator attention required', {
          ...meta,
          operatorAttention: true,
        });
        break;
      default:
        this.logger.error('Refresh cycle failed; keeping current calendar', meta);
    }
  }

  private async persist(record: RefreshRecord): Promise<RefreshRecord> {
    try {
      return await this.store.appendRefreshRecord(record);
    } catch (error) {
      this.logger.error('Failed to record refresh outcome', { status: record.status, error });
      return record;
    }
  }
}

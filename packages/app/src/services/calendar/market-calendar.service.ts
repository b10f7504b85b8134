/**
 * Market calendar service
 *
 * Query surface over the published calendar snapshot plus the refresh
 * pipeline that keeps it current. Queries read the snapshot held in memory
 * and never wait on the database or the network.
 */

import { InvalidInputError } from '@market-hours/contracts';
import type {
  BoundaryDirection,
  DaySession,
  MarketEvent,
  RefreshRecord,
  SessionState,
} from '@market-hours/contracts';
import { CalendarStore } from '@market-hours/calendar-store';
import { RefreshOrchestrator, RefreshScheduler, type SchedulerState } from '@market-hours/calendar-refresh';
import type { Logger } from '@market-hours/logger';
import type { ScheduleSource } from '@market-hours/provider-nyse';
import {
  assertDate,
  classify,
  getSessionWindow,
  getWeekSchedule,
  isMarketOpen,
  listEarlyCloses,
  listHolidays,
  nextMarketEvent,
  nextSessionBoundary,
  exchangeDate,
  type CalendarSnapshot,
  type InstantInput,
} from '@market-hours/sessions-calendar';
import type { HealthStatus, Service } from '../../container/types.js';
import type { DatabaseService } from '../database/database.service.js';
import type { CalendarRange, MarketCalendarServiceConfig } from './types.js';

export class MarketCalendarService implements Service {
  readonly name = 'CalendarService';
  readonly dependencies = ['DatabaseService'];

  private readonly database: DatabaseService;
  private readonly source: ScheduleSource;
  private readonly logger: Logger;
  private readonly config: MarketCalendarServiceConfig;
  private readonly now: () => Date;

  private store: CalendarStore | null = null;
  private scheduler: RefreshScheduler | null = null;

  constructor(config: MarketCalendarServiceConfig) {
    this.config = config;
    this.database = config.database;
    this.source = config.source;
    this.logger = config.logger;
    this.now = config.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    if (this.store) return;

    const store = new CalendarStore(this.database.connection, {
      logger: this.logger,
      schemaDir: this.config.schemaDir,
    });
    await store.init();

    const orchestrator = new RefreshOrchestrator({
      store,
      source: this.source,
      logger: this.logger,
      yearsAhead: this.config.scraper.yearsAhead,
      now: this.now,
    });

    this.store = store;
    this.scheduler = new RefreshScheduler({
      runner: orchestrator,
      logger: this.logger,
      enabled: this.config.scraper.enabled,
      scheduleHour: this.config.scraper.scheduleHour,
      runOnStart: this.config.scraper.runOnStart,
    });

    const snapshot = store.getSnapshot();
    this.logger.info('Calendar service initialized', {
      holidays: snapshot.holidays.size,
      earlyCloses: snapshot.earlyCloses.size,
      committedAt: snapshot.committedAt,
    });

    if (this.config.seedIfEmpty && snapshot.committedAt === null) {
      this.logger.info('No calendar committed yet; running an initial refresh');
      await this.scheduler.triggerNow();
    }
  }

  async shutdown(): Promise<void> {
    await this.scheduler?.stop();
  }

  /**
   * Start the daily refresh job (daemon mode)
   */
  startScheduler(): void {
    this.requireScheduler().start();
  }

  getSchedulerState(): SchedulerState | null {
    return this.scheduler?.getState() ?? null;
  }

  classify(instant: InstantInput): SessionState {
    return classify(instant, this.snapshot());
  }

  isOpen(instant: InstantInput): boolean {
    return isMarketOpen(instant, this.snapshot());
  }

  /**
   * @throws NoUpcomingSessionError when nothing lies inside the lookahead window
   */
  nextSessionBoundary(instant: InstantInput, direction: BoundaryDirection): Date {
    return nextSessionBoundary(instant, direction, this.snapshot(), {
      lookaheadDays: this.config.lookaheadDays,
    });
  }

  nextEvent(instant: InstantInput): MarketEvent {
    return nextMarketEvent(instant, this.snapshot(), { lookaheadDays: this.config.lookaheadDays });
  }

  /**
   * Holidays and early closes with dates in [start, end]
   *
   * @throws InvalidInputError on malformed dates or start after end
   */
  getCalendarRange(start: string, end: string): CalendarRange {
    assertDate(start);
    assertDate(end);
    if (start > end) {
      throw new InvalidInputError(`Range start ${start} is after end ${end}`, { start, end });
    }
    const snapshot = this.snapshot();
    return {
      start,
      end,
      holidays: listHolidays(snapshot, start, end),
      earlyCloses: listEarlyCloses(snapshot, start, end),
    };
  }

  getDay(date: string): DaySession {
    return getSessionWindow(date, this.snapshot());
  }

  /**
   * Seven days from `start`, today's exchange-local date by default
   */
  getWeek(start?: string): DaySession[] {
    return getWeekSchedule(start ?? exchangeDate(this.now()), this.snapshot());
  }

  /**
   * Run a refresh cycle now. Concurrent calls share the running cycle.
   *
   * @throws SchedulerStoppedError after shutdown
   */
  triggerNow(): Promise<RefreshRecord> {
    return this.requireScheduler().triggerNow();
  }

  getLastRefresh(): Promise<RefreshRecord | null> {
    return this.requireStore().getLastRefresh();
  }

  listRefreshHistory(limit = 20): Promise<RefreshRecord[]> {
    return this.requireStore().listRefreshRecords(limit);
  }

  async healthCheck(): Promise<HealthStatus> {
    if (!this.store) {
      return { healthy: false, message: 'Not initialized' };
    }

    const snapshot = this.store.getSnapshot();
    const lastRefresh = await this.store.getLastRefresh();
    const lastSuccess = await this.store.getLastSuccessfulRefresh();
    const scheduler = this.scheduler?.getState();

    const details: Record<string, unknown> = {
      holidays: snapshot.holidays.size,
      earlyCloses: snapshot.earlyCloses.size,
      committedAt: snapshot.committedAt,
      lastRefreshAt: lastRefresh?.runAt ?? null,
      lastRefreshStatus: lastRefresh?.status ?? null,
      lastSuccessAt: lastSuccess?.runAt ?? null,
      scheduler: scheduler?.state ?? null,
      nextRun: scheduler?.nextRun?.toISOString() ?? null,
    };

    if (snapshot.committedAt === null) {
      return { healthy: false, message: 'No calendar committed', details };
    }
    if (lastRefresh?.status === 'FAILURE') {
      return { healthy: true, message: `Serving calendar from ${snapshot.committedAt}; last refresh failed`, details };
    }
    return { healthy: true, message: 'Calendar current', details };
  }

  private snapshot(): CalendarSnapshot {
    return this.requireStore().getSnapshot();
  }

  private requireStore(): CalendarStore {
    if (!this.store) {
      throw new Error('CalendarService not initialized');
    }
    return this.store;
  }

  private requireScheduler(): RefreshScheduler {
    if (!this.scheduler) {
      throw new Error('CalendarService not initialized');
    }
    return this.scheduler;
  }
}

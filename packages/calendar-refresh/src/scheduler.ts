/**
 * Daily refresh scheduler.
 *
 * Schedule: once a day at `scheduleHour`:00 UTC
 * Cron: 0 <hour> * * *
 *
 * Lifecycle: IDLE -> RUNNING -> IDLE, terminal STOPPED. At most one refresh
 * cycle runs at a time; a trigger that arrives mid-cycle joins the running
 * cycle and receives its record.
 */

import { Cron } from 'croner';
import { SchedulerStoppedError } from '@market-hours/contracts';
import type { RefreshRecord } from '@market-hours/contracts';
import type { Logger } from '@market-hours/logger';

const TIMEZONE = 'UTC';

export type SchedulerLifecycle = 'IDLE' | 'RUNNING' | 'STOPPED';

export type RefreshTrigger = 'schedule' | 'startup' | 'manual';

export interface RefreshCycleRunner {
  runRefreshCycle(): Promise<RefreshRecord>;
}

export interface RefreshSchedulerOptions {
  runner: RefreshCycleRunner;
  logger: Logger;
  enabled: boolean;
  /** UTC hour of the daily run, 0-23 */
  scheduleHour: number;
  /** Run one cycle as soon as the scheduler starts (default true) */
  runOnStart?: boolean;
}

export interface SchedulerState {
  state: SchedulerLifecycle;
  enabled: boolean;
  nextRun: Date | null;
  lastRun: Date | null;
  lastRecord: RefreshRecord | null;
  runCount: number;
}

export function dailyCronPattern(hour: number): string {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new RangeError(`Schedule hour must be an integer between 0 and 23, got ${hour}`);
  }
  return `0 ${hour} * * *`;
}

/**
 * First daily trigger strictly after `from`.
 *
 * @example
 * ```typescript
 * nextTriggerTime(new Date('2024-01-01T05:00:00Z'), 6); // 2024-01-01T06:00:00.000Z
 * ```
 */
export function nextTriggerTime(from: Date, hour: number): Date {
  const next = new Cron(dailyCronPattern(hour), { timezone: TIMEZONE }).nextRun(from);
  if (!next) {
    throw new Error(`No upcoming run for ${dailyCronPattern(hour)}`);
  }
  return next;
}

export class RefreshScheduler {
  private readonly runner: RefreshCycleRunner;
  private readonly logger: Logger;
  private readonly enabled: boolean;
  private readonly pattern: string;
  private readonly runOnStart: boolean;

  private job: Cron | null = null;
  private inFlight: Promise<RefreshRecord> | null = null;
  private startupRun: Promise<void> | null = null;
  private stopped = false;
  private lastRun: Date | null = null;
  private lastRecord: RefreshRecord | null = null;
  private runCount = 0;

  constructor(options: RefreshSchedulerOptions) {
    this.runner = options.runner;
    this.logger = options.logger.child({ component: 'scheduler' });
    this.enabled = options.enabled;
    this.pattern = dailyCronPattern(options.scheduleHour);
    this.runOnStart = options.runOnStart ?? true;
  }

  /**
   * Start the scheduled job. A disabled scheduler logs and does nothing.
   *
   * @throws SchedulerStoppedError after stop()
   */
  start(): void {
    if (this.stopped) {
      throw new SchedulerStoppedError();
    }
    if (this.job) {
      return;
    }
    if (!this.enabled) {
      this.logger.info('Refresh scheduler disabled; calendar will only change on manual refresh');
      return;
    }

    this.job = new Cron(this.pattern, { timezone: TIMEZONE, protect: true }, () => this.runScheduled('schedule'));

    this.logger.info('Refresh scheduler started', {
      cron: this.pattern,
      timezone: TIMEZONE,
      nextRun: this.job.nextRun()?.toISOString() ?? null,
    });

    if (this.runOnStart) {
      this.startupRun = this.runScheduled('startup');
    }
  }

  /**
   * Run a cycle now without moving the next scheduled time.
   *
   * @throws SchedulerStoppedError after stop()
   */
  async triggerNow(): Promise<RefreshRecord> {
    if (this.stopped) {
      throw new SchedulerStoppedError();
    }
    return this.runCycle('manual');
  }

  /**
   * Cancel the job and wait for a running cycle to finish. Terminal.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.job?.stop();
    this.job = null;

    await this.startupRun;
    if (this.inFlight) {
      // the trigger that started the cycle already received its error
      await this.inFlight.catch((error: unknown) => {
        this.logger.warn('Refresh cycle running at stop failed', { error });
      });
    }
    this.logger.info('Refresh scheduler stopped', { runCount: this.runCount });
  }

  getState(): SchedulerState {
    let state: SchedulerLifecycle = 'IDLE';
    if (this.stopped) state = 'STOPPED';
    else if (this.inFlight) state = 'RUNNING';

    return {
      state,
      enabled: this.enabled,
      nextRun: this.job?.nextRun() ?? null,
      lastRun: this.lastRun,
      lastRecord: this.lastRecord,
      runCount: this.runCount,
    };
  }

  private runCycle(trigger: RefreshTrigger): Promise<RefreshRecord> {
    if (this.inFlight) {
      this.logger.info('Refresh cycle already running; joining it', { trigger });
      return this.inFlight;
    }

    this.runCount++;
    this.lastRun = new Date();
    this.logger.info('Refresh cycle triggered', { trigger, runCount: this.runCount });

    const cycle = this.startRunner()
      .then((record) => {
        this.lastRecord = record;
        return record;
      })
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = cycle;
    return cycle;
  }

  private startRunner(): Promise<RefreshRecord> {
    try {
      return this.runner.runRefreshCycle();
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private async runScheduled(trigger: RefreshTrigger): Promise<void> {
    try {
      const record = await this.runCycle(trigger);
      this.logger.info('Scheduled refresh finished', { trigger, status: record.status, nextRun: this.job?.nextRun()?.toISOString() });
    } catch (error) {
      this.logger.error('Scheduled refresh cycle threw', { trigger, error });
    }
  }
}

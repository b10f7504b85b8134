/**
 * Shared test wiring: in-memory SQLite, silent logger, fixed clock
 */

import { AcquisitionError } from '@market-hours/contracts';
import type { RawScheduleRecord, YearRange } from '@market-hours/contracts';
import { createLogger, type Logger } from '@market-hours/logger';
import { FixtureScheduleSource, type ScheduleSource } from '@market-hours/provider-nyse';
import { createApplication, type Application } from '../src/bootstrap.js';
import { loadConfig } from '../src/config/index.js';

/** Monday 2024-11-25, 10:00 in New York */
export const NOW = new Date('2024-11-25T15:00:00Z');

export const silentLogger = createLogger({ level: 'error', console: false });

/**
 * Bundled fixture table that can be switched to failing mid-test
 */
export class SwitchableSource implements ScheduleSource {
  readonly name = 'fixture';
  fail = false;
  calls = 0;
  private readonly inner = new FixtureScheduleSource();

  async fetchSchedule(range: YearRange): Promise<RawScheduleRecord[]> {
    this.calls++;
    if (this.fail) {
      throw new AcquisitionError('upstream unreachable', { source: this.name, reason: 'network' });
    }
    return this.inner.fetchSchedule(range);
  }
}

export interface TestAppOptions {
  env?: Record<string, string>;
  source?: ScheduleSource;
  seedIfEmpty?: boolean;
  logger?: Logger;
}

export async function createTestApp(options: TestAppOptions = {}): Promise<Application> {
  const config = loadConfig({
    env: { DB_PATH: ':memory:', SCRAPER_SOURCE: 'fixture', SCRAPER_RUN_ON_START: 'false', ...options.env },
  });
  return createApplication({
    config,
    logger: options.logger ?? silentLogger,
    source: options.source ?? new SwitchableSource(),
    seedIfEmpty: options.seedIfEmpty ?? true,
    now: () => NOW,
  });
}

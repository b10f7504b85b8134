/**
 * Types for the market calendar service
 */

import type { EarlyCloseOverride, Holiday } from '@market-hours/contracts';
import type { Logger } from '@market-hours/logger';
import type { ScheduleSource } from '@market-hours/provider-nyse';
import type { DatabaseService } from '../database/database.service.js';

export interface MarketCalendarServiceConfig {
  database: DatabaseService;
  source: ScheduleSource;
  logger: Logger;
  scraper: {
    enabled: boolean;
    /** UTC hour of the daily refresh */
    scheduleHour: number;
    runOnStart: boolean;
    yearsAhead: number;
  };
  lookaheadDays: number;
  /** Run one refresh during initialize when nothing has been committed yet */
  seedIfEmpty?: boolean;
  schemaDir?: string;
  now?: () => Date;
}

export interface CalendarRange {
  start: string;
  end: string;
  holidays: Holiday[];
  earlyCloses: EarlyCloseOverride[];
}

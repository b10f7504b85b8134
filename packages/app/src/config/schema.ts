/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { NYSE_HOLIDAYS_URL } from '@market-hours/provider-nyse';

/**
 * Boolean from an env string ("true"/"false") or a real boolean
 */
const booleanish = z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')]);

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
      name: z.string().default('market-hours'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  database: z
    .object({
      path: z.string().min(1).default('data/market_hours.db'),
    })
    .default({}),

  scraper: z
    .object({
      enabled: booleanish.default(true),
      scheduleHour: z.coerce.number().int().min(0).max(23).default(6),
      timeoutMs: z.coerce.number().int().positive().default(30000),
      source: z.enum(['nyse', 'fixture']).default('nyse'),
      url: z.string().url().default(NYSE_HOLIDAYS_URL),
      runOnStart: booleanish.default(true),
      yearsAhead: z.coerce.number().int().min(0).max(5).default(1),
      fixturePath: z.string().min(1).optional(),
    })
    .default({}),

  calendar: z
    .object({
      lookaheadDays: z.coerce.number().int().positive().default(14),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  DB_PATH: 'database.path',
  SCRAPER_ENABLED: 'scraper.enabled',
  SCRAPER_SCHEDULE_HOUR: 'scraper.scheduleHour',
  SCRAPER_TIMEOUT_MS: 'scraper.timeoutMs',
  SCRAPER_SOURCE: 'scraper.source',
  SCRAPER_URL: 'scraper.url',
  SCRAPER_RUN_ON_START: 'scraper.runOnStart',
  SCRAPER_YEARS_AHEAD: 'scraper.yearsAhead',
  SCRAPER_FIXTURE_PATH: 'scraper.fixturePath',
  CALENDAR_LOOKAHEAD_DAYS: 'calendar.lookaheadDays',
};

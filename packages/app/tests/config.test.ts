/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { getConfigSummary, loadConfig } from '../src/config/index.js';

describe('loadConfig', () => {
  it('applies defaults with an empty environment', () => {
    const config = loadConfig({ env: {} });

    expect(config.app.env).toBe('development');
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
    expect(config.database.path).toBe('data/market_hours.db');
    expect(config.scraper).toEqual({
      enabled: true,
      scheduleHour: 6,
      timeoutMs: 30000,
      source: 'nyse',
      url: 'https://www.nyse.com/markets/hours-calendars',
      runOnStart: true,
      yearsAhead: 1,
    });
    expect(config.calendar.lookaheadDays).toBe(14);
  });

  it('maps environment variables onto nested settings', () => {
    const config = loadConfig({
      env: {
        NODE_ENV: 'production',
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'json',
        LOG_FILE: 'logs/market-hours.log',
        DB_PATH: '/var/lib/market-hours/calendar.db',
        SCRAPER_ENABLED: 'false',
        SCRAPER_SCHEDULE_HOUR: '22',
        SCRAPER_TIMEOUT_MS: '5000',
        SCRAPER_SOURCE: 'fixture',
        SCRAPER_RUN_ON_START: 'false',
        SCRAPER_YEARS_AHEAD: '2',
        CALENDAR_LOOKAHEAD_DAYS: '30',
      },
    });

    expect(config.app.env).toBe('production');
    expect(config.logging).toEqual({ level: 'debug', format: 'json', filePath: 'logs/market-hours.log' });
    expect(config.database.path).toBe('/var/lib/market-hours/calendar.db');
    expect(config.scraper).toMatchObject({
      enabled: false,
      scheduleHour: 22,
      timeoutMs: 5000,
      source: 'fixture',
      runOnStart: false,
      yearsAhead: 2,
    });
    expect(config.calendar.lookaheadDays).toBe(30);
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ env: { SCRAPER_SCHEDULE_HOUR: '  ', LOG_LEVEL: '' } });

    expect(config.scraper.scheduleHour).toBe(6);
    expect(config.logging.level).toBe('info');
  });

  it('rejects an out-of-range schedule hour', () => {
    expect(() => loadConfig({ env: { SCRAPER_SCHEDULE_HOUR: '24' } })).toThrow(
      /Configuration validation failed:\nscraper\.scheduleHour: /
    );
  });

  it('lists every invalid setting', () => {
    let message = '';
    try {
      loadConfig({ env: { SCRAPER_SOURCE: 'bloomberg', SCRAPER_ENABLED: 'yes' } });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message).toContain('scraper.enabled');
    expect(message).toContain('scraper.source');
  });

  it('rejects a malformed source URL', () => {
    expect(() => loadConfig({ env: { SCRAPER_URL: 'not a url' } })).toThrow(/scraper\.url/);
  });
});

describe('getConfigSummary', () => {
  it('summarizes the settings worth logging at startup', () => {
    const summary = getConfigSummary(loadConfig({ env: { SCRAPER_SOURCE: 'fixture' } }));

    expect(summary).toEqual({
      environment: 'development',
      database: 'data/market_hours.db',
      scraper: {
        enabled: true,
        source: 'fixture',
        scheduleHourUtc: 6,
        timeoutMs: 30000,
        runOnStart: true,
        yearsAhead: 1,
      },
      calendar: { lookaheadDays: 14 },
      logging: { level: 'info', format: 'pretty', file: null },
    });
  });
});

/**
 * Configuration loading and management
 */

import { configSchema, envMapping, type Config } from './schema.js';
import type { Logger } from '@market-hours/logger';

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Environment to read, defaults to process.env */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws Error listing every invalid setting
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(rawConfig, configPath, value.trim());
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  options.logger?.info('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: string): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    database: config.database.path,
    scraper: {
      enabled: config.scraper.enabled,
      source: config.scraper.source,
      scheduleHourUtc: config.scraper.scheduleHour,
      timeoutMs: config.scraper.timeoutMs,
      runOnStart: config.scraper.runOnStart,
      yearsAhead: config.scraper.yearsAhead,
    },
    calendar: {
      lookaheadDays: config.calendar.lookaheadDays,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';

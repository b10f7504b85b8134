/**
 * Application wiring shared by the CLI and the daemon
 */

import type { AxiosInstance } from 'axios';
import { startTimer, type Logger } from '@market-hours/logger';
import { createScheduleSource, type ScheduleSource } from '@market-hours/provider-nyse';
import { Container, TOKENS } from './container/index.js';
import type { Config } from './config/index.js';
import { DatabaseService } from './services/database/database.service.js';
import { MarketCalendarService } from './services/calendar/market-calendar.service.js';
import { DefaultCommandRegistry } from './commands/registry.js';
import { registerCalendarCommands } from './commands/register-calendar-commands.js';
import type { CommandRegistry } from './commands/types.js';

export interface ApplicationOptions {
  config: Config;
  logger: Logger;
  /** Replaces the configured schedule source */
  source?: ScheduleSource;
  /** HTTP client handed to the NYSE source */
  httpClient?: AxiosInstance;
  /** Run one refresh during startup when the store is empty */
  seedIfEmpty?: boolean;
  now?: () => Date;
}

export interface Application {
  container: Container;
  calendar: MarketCalendarService;
  commands: CommandRegistry;
  shutdown(): Promise<void>;
}

/**
 * Register all services in the container
 */
export function registerServices(container: Container, options: ApplicationOptions): void {
  const { config, logger } = options;

  container.register(TOKENS.Logger, () => logger);
  container.register(TOKENS.Config, () => config);

  container.register(
    TOKENS.DatabaseService,
    () => new DatabaseService({ path: config.database.path, logger: logger.child({ service: 'database' }) })
  );

  container.register(
    TOKENS.ScheduleSource,
    () =>
      options.source ??
      createScheduleSource({
        kind: config.scraper.source,
        url: config.scraper.url,
        timeoutMs: config.scraper.timeoutMs,
        fixturePath: config.scraper.fixturePath,
        httpClient: options.httpClient,
        logger: logger.child({ service: 'source' }),
      })
  );

  container.register(
    TOKENS.CalendarService,
    (c) =>
      new MarketCalendarService({
        database: c.resolve(TOKENS.DatabaseService),
        source: c.resolve(TOKENS.ScheduleSource),
        logger: logger.child({ service: 'calendar' }),
        scraper: config.scraper,
        lookaheadDays: config.calendar.lookaheadDays,
        seedIfEmpty: options.seedIfEmpty,
        now: options.now,
      }),
    { dependencies: [TOKENS.DatabaseService, TOKENS.ScheduleSource] }
  );

  container.register(
    TOKENS.CommandRegistry,
    (c) => {
      const registry = new DefaultCommandRegistry();
      registerCalendarCommands({
        registry,
        calendar: c.resolve(TOKENS.CalendarService),
        container: c,
        logger,
        now: options.now,
      });
      return registry;
    },
    { dependencies: [TOKENS.CalendarService] }
  );
}

/**
 * Build the container, initialize every service and hand back the pieces
 * the entry points use.
 */
export async function createApplication(options: ApplicationOptions): Promise<Application> {
  const { logger } = options;
  const timer = startTimer();

  const container = new Container({
    onShutdownError: (name, error) => logger.error('Service shutdown failed', { service: name, error }),
  });
  registerServices(container, options);

  try {
    await container.initializeAll();
  } catch (error) {
    await container.shutdownAll();
    throw error;
  }

  logger.info('Services initialized', { operation: 'service_init', duration_ms: timer.stop() });

  return {
    container,
    calendar: container.resolve(TOKENS.CalendarService),
    commands: container.resolve(TOKENS.CommandRegistry),
    shutdown: () => container.shutdownAll(),
  };
}

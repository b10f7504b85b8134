/**
 * Calendar command registration
 */

import type { Logger } from '@market-hours/logger';
import type { IContainer } from '../container/types.js';
import type { MarketCalendarService } from '../services/calendar/market-calendar.service.js';
import type { CommandRegistry } from './types.js';
import { HealthCommand } from './health.command.js';
import { HolidaysCommand } from './holidays.command.js';
import { HistoryCommand, LastRefreshCommand } from './last-refresh.command.js';
import { NextCommand } from './next.command.js';
import { RefreshCommand } from './refresh.command.js';
import { StatusCommand } from './status.command.js';
import { WeekCommand } from './week.command.js';

export interface RegisterCalendarCommandsConfig {
  registry: CommandRegistry;
  calendar: MarketCalendarService;
  container: IContainer;
  logger: Logger;
  now?: () => Date;
}

/**
 * Register every calendar command plus health
 */
export function registerCalendarCommands(config: RegisterCalendarCommandsConfig): void {
  const { registry, calendar, container, logger, now } = config;
  const commandConfig = (name: string) => ({ calendar, now, logger: logger.child({ command: name }) });

  registry.register(new StatusCommand(commandConfig('status')));
  registry.register(new NextCommand(commandConfig('next')));
  registry.register(new HolidaysCommand(commandConfig('holidays')));
  registry.register(new WeekCommand(commandConfig('week')));
  registry.register(new RefreshCommand(commandConfig('refresh')));
  registry.register(new LastRefreshCommand(commandConfig('last-refresh')));
  registry.register(new HistoryCommand(commandConfig('history')));
  registry.register(new HealthCommand({ container, logger: logger.child({ command: 'health' }) }));

  logger.debug('Calendar commands registered', { commands: registry.list().map((c) => c.name) });
}

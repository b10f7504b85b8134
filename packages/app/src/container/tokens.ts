/**
 * Service tokens for dependency injection
 *
 * A token carries the type of the service it resolves to, and keeps the
 * factory and singleton bound to it per container.
 */

import type { Logger } from '@market-hours/logger';
import type { ScheduleSource } from '@market-hours/provider-nyse';
import type { Config } from '../config/index.js';
import type { CommandRegistry } from '../commands/types.js';
import type { DatabaseService } from '../services/database/database.service.js';
import type { MarketCalendarService } from '../services/calendar/market-calendar.service.js';
import type { IContainer, ServiceFactory } from './types.js';

export class ServiceToken<T> {
  readonly id: symbol;
  private readonly factories = new WeakMap<IContainer, ServiceFactory<T>>();
  private readonly instances = new WeakMap<IContainer, T>();

  constructor(readonly name: string) {
    this.id = Symbol(name);
  }

  bind(container: IContainer, factory: ServiceFactory<T>): void {
    this.factories.set(container, factory);
    this.instances.delete(container);
  }

  isBound(container: IContainer): boolean {
    return this.factories.has(container);
  }

  create(container: IContainer): T {
    const factory = this.factories.get(container);
    if (!factory) {
      throw new Error(`Service not registered: ${this.name}`);
    }
    return factory(container);
  }

  cached(container: IContainer): { hit: true; value: T } | { hit: false } {
    if (!this.instances.has(container)) {
      return { hit: false };
    }
    const value = this.instances.get(container);
    return value === undefined ? { hit: false } : { hit: true, value };
  }

  cache(container: IContainer, value: T): void {
    this.instances.set(container, value);
  }

  toString(): string {
    return this.name;
  }
}

export const TOKENS = {
  // Core infrastructure
  Logger: new ServiceToken<Logger>('Logger'),
  Config: new ServiceToken<Config>('Config'),

  // Application services
  DatabaseService: new ServiceToken<DatabaseService>('DatabaseService'),
  ScheduleSource: new ServiceToken<ScheduleSource>('ScheduleSource'),
  CalendarService: new ServiceToken<MarketCalendarService>('CalendarService'),

  // Commands
  CommandRegistry: new ServiceToken<CommandRegistry>('CommandRegistry'),
} as const;

/**
 * Get token name for debugging
 */
export function getTokenName(token: ServiceToken<unknown> | symbol): string {
  if (typeof token === 'symbol') {
    const entry = Object.values(TOKENS).find((t) => t.id === token);
    return entry ? entry.name : token.toString();
  }
  return token.name;
}

/**
 * Main exports for @market-hours/app
 */

// Container exports
export { Container, isService } from './container/index.js';
export { TOKENS, ServiceToken } from './container/tokens.js';
export type {
  Service,
  ServiceConfig,
  HealthStatus,
  IContainer,
  DependencyNode,
  ServiceFactory,
  ServiceRegistration,
  RegistrationMetadata,
} from './container/types.js';

// Configuration exports
export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config, LoadConfigOptions } from './config/index.js';

// Services
export { DatabaseService } from './services/database/database.service.js';
export { MarketCalendarService } from './services/calendar/market-calendar.service.js';
export type { MarketCalendarServiceConfig, CalendarRange } from './services/calendar/types.js';

// Commands
export { DefaultCommandRegistry } from './commands/registry.js';
export { registerCalendarCommands } from './commands/register-calendar-commands.js';
export { CommandError, CommandErrorCode } from './commands/errors.js';
export type { Command, CommandOptions, CommandResult, CommandRegistry, OutputFormat } from './commands/types.js';

// Wiring and entry points
export { createApplication, registerServices } from './bootstrap.js';
export type { Application, ApplicationOptions } from './bootstrap.js';
export { createProgram } from './program.js';
export type { CommandRunner, ProgramHandlers } from './program.js';
export { runDaemon } from './daemon.js';

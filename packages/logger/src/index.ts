/**
 * @fileoverview Public API of @market-hours/logger.
 * Structured logging and process error handling for the calendar packages.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
  setRequestContext,
  withCLIRequestContext,
  withJobRequestContext,
} from './request-context.js';

export { startTimer, measureAsync } from './perf-timer.js';

export { redactPII, redactSensitiveFields, isSensitiveFieldName } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';

/**
 * @fileoverview Logger factory. Creates winston loggers with secret
 * redaction, standard fields and console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger.
 *
 * Format chain: redact secrets and add standard fields at the logger, then
 * each transport renders: the console as JSON or pretty depending on
 * `json`, the file always as JSON.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Calendar service started', { source: 'nyse' });
 *
 * const refreshLogger = logger.child({ component: 'refresh' });
 * refreshLogger.warn('Refresh cycle failed, keeping previous calendar', { error_kind: 'ACQUISITION' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
  } = config;

  // redaction and request_id run once, in the caller's context; transports only render
  const baseFormat = format.combine(redactPII(), standardFields);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: json ? format.json() : prettyPrint,
        stderrLevels: stderr ? ['error', 'warn', 'info', 'debug'] : [],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // the file always gets JSON lines, whatever the console shows
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // winston complains about a logger without transports
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    // errorHandler.ts owns process exit on uncaught errors
    exitOnError: false,
  });
}

/**
 * Child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const storeLogger = createChildLogger(logger, { component: 'calendar-store' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

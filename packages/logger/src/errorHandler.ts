/**
 * @fileoverview Process-wide handlers for uncaught exceptions and unhandled
 * rejections. Errors are logged, then the process exits once the logger has
 * flushed (or after FLUSH_TIMEOUT_MS).
 */

import type { Logger } from './types.js';

const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Attaches global error handlers. Safe to call more than once; later calls
 * are ignored with a warning.
 *
 * The refresh pipeline absorbs its own failures, so anything reaching these
 * handlers is a programming error and the process fails fast.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: describeError(warning),
      event: 'warning',
    });
  });

  handlersAttached = true;

  logger.info('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
}

/**
 * Ends the logger and exits when its transports finish, or after the flush
 * timeout.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}

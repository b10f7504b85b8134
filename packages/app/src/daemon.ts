/**
 * Long-running service: daily refresh scheduler over the calendar store
 */

import {
  attachGlobalHandlers,
  createLogger,
  startTimer,
  withRequestContext,
  type Logger,
} from '@market-hours/logger';
import { createApplication, type Application } from './bootstrap.js';
import { getConfigSummary, loadConfig, type Config } from './config/index.js';

const KEEP_ALIVE_MS = 60 * 60 * 1000;

export function createAppLogger(config: Config, overrides: { stderr?: boolean } = {}): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    stderr: overrides.stderr,
  });
}

function waitForShutdownSignal(logger: Logger): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    // the scheduler may be disabled, leaving nothing else to hold the loop open
    const keepAlive = setInterval(() => undefined, KEEP_ALIVE_MS);
    const onSignal = (signal: NodeJS.Signals) => {
      clearInterval(keepAlive);
      logger.info('Shutdown signal received', { signal });
      resolve(signal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

/**
 * Start the service and resolve after a clean shutdown on SIGINT/SIGTERM
 */
export async function runDaemon(): Promise<void> {
  const config = loadConfig();
  const logger = createAppLogger(config);
  attachGlobalHandlers(logger);

  const app: Application = await withRequestContext(async () => {
    const timer = startTimer();
    logger.info('Starting market hours service', { ...getConfigSummary(config), operation: 'app_startup' });

    const started = await createApplication({ config, logger });
    started.calendar.startScheduler();

    logger.info('Market hours service started', {
      operation: 'app_startup',
      duration_ms: timer.stop(),
      result: 'success',
      scheduler: started.calendar.getSchedulerState(),
    });
    return started;
  });

  await waitForShutdownSignal(logger);
  await app.shutdown();
  logger.info('Market hours service stopped');
}

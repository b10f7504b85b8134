#!/usr/bin/env node

/**
 * CLI entry point for the market-hours command
 */

import 'dotenv/config';
import chalk from 'chalk';
import { withCLIRequestContext } from '@market-hours/logger';
import { createApplication } from './bootstrap.js';
import { loadConfig } from './config/index.js';
import { createAppLogger, runDaemon } from './daemon.js';
import { createProgram } from './program.js';
import type { CommandOptions, CommandResult } from './commands/types.js';

/** Commands that answer from the calendar and need one to exist */
const QUERY_COMMANDS = new Set(['status', 'next', 'holidays', 'week']);

async function runCommand(name: string, args: string[], options: CommandOptions): Promise<CommandResult> {
  // command output owns stdout; keep routine logs quiet unless asked for
  process.env['LOG_LEVEL'] ??= options.verbose ? 'debug' : 'warn';

  const config = loadConfig();
  const logger = createAppLogger(config, { stderr: true });
  const app = await createApplication({ config, logger, seedIfEmpty: QUERY_COMMANDS.has(name) });

  try {
    const result = await withCLIRequestContext(`cli:${name}`, { format: options.format })(() =>
      app.commands.execute(name, args, options)
    );

    if (result.success) {
      console.log(result.output);
    } else {
      console.error(options.format === 'json' ? result.output : chalk.red(result.output));
      process.exitCode = 1;
    }
    return result;
  } finally {
    await app.shutdown();
  }
}

createProgram({ run: runCommand, serve: runDaemon })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });

/**
 * market-hours command line definition
 */

import { Command as Program, InvalidArgumentError, Option } from 'commander';
import type { CommandOptions, CommandResult, OutputFormat } from './commands/types.js';

export type CommandRunner = (name: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

export interface ProgramHandlers {
  /** Runs a registered calendar command */
  run: CommandRunner;
  /** Starts the daemon and resolves once it has stopped */
  serve: () => Promise<void>;
}

interface OutputFlags {
  format: OutputFormat;
  verbose?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function withOutputFlags(command: Program): Program {
  return command
    .addOption(new Option('-f, --format <format>', 'output format').choices(['text', 'json']).default('text'))
    .option('-v, --verbose', 'include error detail and service wiring', false);
}

/**
 * Build the commander program. Every calendar subcommand goes through
 * `handlers.run`; `serve` starts the daemon.
 */
export function createProgram(handlers: ProgramHandlers, version = '0.1.0'): Program {
  const program = new Program();

  program
    .name('market-hours')
    .description('US equity market hours: session status, holidays and schedule refresh')
    .version(version);

  withOutputFlags(
    program
      .command('status')
      .description('Show whether the market is open')
      .option('--at <instant>', 'ISO 8601 instant with Z or offset (default now)')
  ).action(async (options: OutputFlags & { at?: string }) => {
    await handlers.run('status', [], options);
  });

  withOutputFlags(
    program
      .command('next')
      .description('Show the next open or close')
      .option('--at <instant>', 'ISO 8601 instant with Z or offset (default now)')
      .addOption(new Option('--direction <direction>', 'boundary to search for').choices(['open', 'close']))
  ).action(async (options: OutputFlags & { at?: string; direction?: 'open' | 'close' }) => {
    await handlers.run('next', [], options);
  });

  withOutputFlags(
    program
      .command('holidays')
      .description('List holidays and early closes in a date range')
      .requiredOption('--from <date>', 'first date (YYYY-MM-DD)')
      .requiredOption('--to <date>', 'last date (YYYY-MM-DD)')
  ).action(async (options: OutputFlags & { from: string; to: string }) => {
    await handlers.run('holidays', [], options);
  });

  withOutputFlags(
    program
      .command('week')
      .description('Show seven days of trading hours')
      .option('--start <date>', 'first date (YYYY-MM-DD, default today)')
  ).action(async (options: OutputFlags & { start?: string }) => {
    await handlers.run('week', [], options);
  });

  withOutputFlags(program.command('refresh').description('Fetch and commit the holiday schedule now')).action(
    async (options: OutputFlags) => {
      await handlers.run('refresh', [], options);
    }
  );

  withOutputFlags(program.command('last-refresh').description('Show the most recent refresh attempt')).action(
    async (options: OutputFlags) => {
      await handlers.run('last-refresh', [], options);
    }
  );

  withOutputFlags(
    program
      .command('history')
      .description('List recent refresh attempts')
      .option('--limit <n>', 'number of records', parsePositiveInt, 20)
  ).action(async (options: OutputFlags & { limit: number }) => {
    await handlers.run('history', [], options);
  });

  withOutputFlags(program.command('health').description('Check service health')).action(
    async (options: OutputFlags) => {
      await handlers.run('health', [], options);
    }
  );

  program
    .command('serve')
    .description('Run the refresh scheduler until SIGINT or SIGTERM')
    .action(async () => {
      await handlers.serve();
    });

  return program;
}

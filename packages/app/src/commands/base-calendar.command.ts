/**
 * Base command class for calendar commands
 *
 * Template method: subclasses parse their arguments, run against the
 * calendar service and render text; the base handles JSON output, timing,
 * logging and error mapping.
 */

import { startTimer, type Logger } from '@market-hours/logger';
import { toInstant } from '@market-hours/sessions-calendar';
import type { MarketCalendarService } from '../services/calendar/market-calendar.service.js';
import type { Command, CommandOptions, CommandResult } from './types.js';
import { wrapError } from './errors.js';

export interface CalendarCommandConfig {
  calendar: MarketCalendarService;
  logger: Logger;
  /** Clock for commands whose reference instant defaults to now */
  now?: () => Date;
}

export abstract class BaseCalendarCommand<TArgs, TData> implements Command {
  abstract readonly name: string;
  abstract readonly description: string;
  readonly aliases?: string[];

  protected readonly calendar: MarketCalendarService;
  protected readonly logger: Logger;
  protected readonly now: () => Date;

  constructor(config: CalendarCommandConfig) {
    this.calendar = config.calendar;
    this.logger = config.logger;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Reference instant from --at, the first argument, or the clock
   */
  protected referenceInstant(args: string[], options: CommandOptions): Date {
    const raw = options.at ?? args[0];
    return raw === undefined ? this.now() : toInstant(raw);
  }

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const timer = startTimer();

    try {
      this.logger.debug(`Executing ${this.name} command`, { args, options });

      const parsed = this.parseArgs(args, options);
      const data = await this.run(parsed);
      const success = this.isSuccess(data);

      this.logger.info(`${this.name} command completed`, {
        duration_ms: timer.elapsed(),
        result: success ? 'success' : 'failure',
      });

      return {
        success,
        output: options.format === 'json' ? JSON.stringify(data, null, 2) : this.formatText(data),
        duration: timer.stop(),
        metadata: { command: this.name },
      };
    } catch (error) {
      const wrapped = wrapError(error, { command: this.name });
      this.logger.error(`${this.name} command failed`, { code: wrapped.code, error: wrapped.message });

      return {
        success: false,
        output:
          options.format === 'json'
            ? JSON.stringify({ error: wrapped.toJSON() }, null, 2)
            : wrapped.format(options.verbose),
        error: wrapped,
        duration: timer.stop(),
        metadata: { command: this.name, code: wrapped.code },
      };
    }
  }

  /**
   * Parse and validate command arguments
   *
   * @throws CommandError or InvalidInputError for bad arguments
   */
  protected abstract parseArgs(args: string[], options: CommandOptions): TArgs;

  protected abstract run(parsed: TArgs): Promise<TData>;

  protected abstract formatText(data: TData): string;

  protected isSuccess(_data: TData): boolean {
    return true;
  }
}

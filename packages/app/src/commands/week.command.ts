/**
 * week command - seven-day trading schedule
 */

import type { DaySession } from '@market-hours/contracts';
import { exchangeDate } from '@market-hours/sessions-calendar';
import { BaseCalendarCommand } from './base-calendar.command.js';
import type { CommandOptions } from './types.js';
import { formatDaySession } from '../formatters/calendar-formatter.js';

export class WeekCommand extends BaseCalendarCommand<string, DaySession[]> {
  readonly name = 'week';
  readonly description = 'Show the trading schedule for seven days (default from today)';

  protected parseArgs(args: string[], options: CommandOptions): string {
    return options.start ?? args[0] ?? exchangeDate(this.now());
  }

  protected async run(start: string): Promise<DaySession[]> {
    return this.calendar.getWeek(start);
  }

  protected formatText(days: DaySession[]): string {
    return days.map(formatDaySession).join('\n');
  }
}

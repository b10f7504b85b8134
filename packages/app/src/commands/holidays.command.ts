/**
 * holidays command - holidays and early closes in a date range
 */

import { BaseCalendarCommand } from './base-calendar.command.js';
import { CommandError, CommandErrorCode } from './errors.js';
import type { CommandOptions } from './types.js';
import type { CalendarRange } from '../services/calendar/types.js';
import { formatCalendarRange } from '../formatters/calendar-formatter.js';

interface HolidaysArgs {
  from: string;
  to: string;
}

export class HolidaysCommand extends BaseCalendarCommand<HolidaysArgs, CalendarRange> {
  readonly name = 'holidays';
  readonly description = 'List holidays and early closes between two dates';

  protected parseArgs(args: string[], options: CommandOptions): HolidaysArgs {
    const from = options.from ?? args[0];
    const to = options.to ?? args[1];
    if (!from || !to) {
      throw new CommandError(CommandErrorCode.INVALID_ARGS, 'Both --from and --to dates (YYYY-MM-DD) are required');
    }
    return { from, to };
  }

  protected async run({ from, to }: HolidaysArgs): Promise<CalendarRange> {
    return this.calendar.getCalendarRange(from, to);
  }

  protected formatText(data: CalendarRange): string {
    return formatCalendarRange(data);
  }
}

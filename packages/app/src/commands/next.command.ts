/**
 * next command - next session open or close
 */

import type { BoundaryDirection } from '@market-hours/contracts';
import { exchangeDate } from '@market-hours/sessions-calendar';
import { BaseCalendarCommand } from './base-calendar.command.js';
import { CommandError, CommandErrorCode } from './errors.js';
import type { CommandOptions } from './types.js';
import { formatDuration } from '../formatters/calendar-formatter.js';

interface NextArgs {
  from: Date;
  /** Absent: whichever transition comes next */
  direction?: BoundaryDirection;
}

export interface NextData {
  from: string;
  type: 'open' | 'close';
  at: string;
  secondsUntil: number;
  /** Exchange-local date of the transition */
  date: string;
  isEarlyClose: boolean;
  notes: string;
}

export class NextCommand extends BaseCalendarCommand<NextArgs, NextData> {
  readonly name = 'next';
  readonly description = 'Show the next market open or close';

  protected parseArgs(args: string[], options: CommandOptions): NextArgs {
    const from = this.referenceInstant(args, options);
    switch (options.direction) {
      case undefined:
        return { from };
      case 'open':
        return { from, direction: 'NEXT_OPEN' };
      case 'close':
        return { from, direction: 'NEXT_CLOSE' };
      default:
        throw new CommandError(CommandErrorCode.INVALID_ARGS, `Direction must be "open" or "close"`, {
          direction: options.direction,
        });
    }
  }

  protected async run({ from, direction }: NextArgs): Promise<NextData> {
    if (!direction) {
      const event = this.calendar.nextEvent(from);
      return {
        from: from.toISOString(),
        type: event.type,
        at: event.at.toISOString(),
        secondsUntil: event.secondsUntil,
        date: event.date,
        isEarlyClose: event.isEarlyClose,
        notes: event.notes,
      };
    }

    const at = this.calendar.nextSessionBoundary(from, direction);
    const day = this.calendar.getDay(exchangeDate(at));
    return {
      from: from.toISOString(),
      type: direction === 'NEXT_OPEN' ? 'open' : 'close',
      at: at.toISOString(),
      secondsUntil: Math.floor((at.getTime() - from.getTime()) / 1000),
      date: day.date,
      isEarlyClose: day.isEarlyClose,
      notes: day.notes,
    };
  }

  protected formatText(data: NextData): string {
    return `Next ${data.type}: ${data.at} (in ${formatDuration(data.secondsUntil)})\n${data.date}: ${data.notes}`;
  }
}

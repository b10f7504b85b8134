/**
 * status command - session state of an instant
 */

import { isNoUpcomingSessionError } from '@market-hours/contracts';
import type { MarketEvent, SessionState } from '@market-hours/contracts';
import { BaseCalendarCommand } from './base-calendar.command.js';
import type { CommandOptions } from './types.js';
import { describeState, formatDuration } from '../formatters/calendar-formatter.js';

export interface StatusData {
  at: string;
  isOpen: boolean;
  state: SessionState;
  /** Next open or close, null when none falls inside the lookahead window */
  nextEvent: MarketEvent | null;
}

export class StatusCommand extends BaseCalendarCommand<Date, StatusData> {
  readonly name = 'status';
  readonly description = 'Show whether the market is open at an instant (default now)';
  override readonly aliases = ['now'];

  protected parseArgs(args: string[], options: CommandOptions): Date {
    return this.referenceInstant(args, options);
  }

  protected async run(at: Date): Promise<StatusData> {
    const state = this.calendar.classify(at);
    return {
      at: at.toISOString(),
      isOpen: state.status === 'OPEN',
      state,
      nextEvent: this.findNextEvent(at),
    };
  }

  protected formatText(data: StatusData): string {
    const lines = [`Market at ${data.at}: ${describeState(data.state)}`];
    if (data.nextEvent) {
      const event = data.nextEvent;
      lines.push(`Next ${event.type}: ${event.at.toISOString()} (in ${formatDuration(event.secondsUntil)})`);
    } else {
      lines.push('No open or close within the lookahead window');
    }
    return lines.join('\n');
  }

  private findNextEvent(at: Date): MarketEvent | null {
    try {
      return this.calendar.nextEvent(at);
    } catch (error) {
      if (isNoUpcomingSessionError(error)) {
        return null;
      }
      throw error;
    }
  }
}

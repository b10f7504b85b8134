/**
 * last-refresh and history commands - refresh audit log
 */

import type { RefreshRecord } from '@market-hours/contracts';
import { BaseCalendarCommand } from './base-calendar.command.js';
import { CommandError, CommandErrorCode } from './errors.js';
import type { CommandOptions } from './types.js';
import { formatRefreshRecord } from '../formatters/calendar-formatter.js';

export class LastRefreshCommand extends BaseCalendarCommand<void, RefreshRecord | null> {
  readonly name = 'last-refresh';
  readonly description = 'Show the most recent refresh attempt';

  protected parseArgs(): void {}

  protected run(): Promise<RefreshRecord | null> {
    return this.calendar.getLastRefresh();
  }

  protected formatText(record: RefreshRecord | null): string {
    return record ? formatRefreshRecord(record) : 'No refresh has run yet';
  }
}

export class HistoryCommand extends BaseCalendarCommand<number, RefreshRecord[]> {
  readonly name = 'history';
  readonly description = 'List recent refresh attempts, newest first';

  protected parseArgs(_args: string[], options: CommandOptions): number {
    const limit = options.limit ?? 20;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new CommandError(CommandErrorCode.INVALID_ARGS, 'Limit must be a positive integer', { limit });
    }
    return limit;
  }

  protected run(limit: number): Promise<RefreshRecord[]> {
    return this.calendar.listRefreshHistory(limit);
  }

  protected formatText(records: RefreshRecord[]): string {
    return records.length === 0 ? 'No refresh has run yet' : records.map(formatRefreshRecord).join('\n');
  }
}

/**
 * refresh command - run a calendar refresh cycle now
 */

import type { RefreshRecord } from '@market-hours/contracts';
import { BaseCalendarCommand } from './base-calendar.command.js';
import { formatRefreshRecord } from '../formatters/calendar-formatter.js';

export class RefreshCommand extends BaseCalendarCommand<void, RefreshRecord> {
  readonly name = 'refresh';
  readonly description = 'Fetch the holiday schedule now and commit it';

  protected parseArgs(): void {}

  protected run(): Promise<RefreshRecord> {
    return this.calendar.triggerNow();
  }

  protected formatText(record: RefreshRecord): string {
    return formatRefreshRecord(record);
  }

  protected override isSuccess(record: RefreshRecord): boolean {
    return record.status === 'SUCCESS';
  }
}

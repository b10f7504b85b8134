/**
 * Schedule source backed by the NYSE holidays page.
 */

import type { RawScheduleRecord, YearRange } from "@market-hours/contracts";
import { PageClient } from "./client.js";
import { parseNyseHolidayTable } from "./parse.js";
import type { NyseSourceConfig, ScheduleSource } from "./types.js";

export const NYSE_HOLIDAYS_URL = "https://www.nyse.com/markets/hours-calendars";

/**
 * @example
 * ```typescript
 * const source = new NyseScheduleSource({ url: NYSE_HOLIDAYS_URL, timeoutMs: 30000, logger });
 * const records = await source.fetchSchedule({ startYear: 2025, endYear: 2026 });
 * ```
 */
export class NyseScheduleSource implements ScheduleSource {
  readonly name = "nyse";

  private readonly client: PageClient;
  private readonly config: NyseSourceConfig;

  constructor(config: NyseSourceConfig) {
    this.config = config;
    this.client = new PageClient({
      source: this.name,
      timeoutMs: config.timeoutMs,
      httpClient: config.httpClient,
      logger: config.logger,
    });
  }

  async fetchSchedule(range: YearRange): Promise<RawScheduleRecord[]> {
    const html = await this.client.getText(this.config.url);
    const records = parseNyseHolidayTable(html, range);

    this.config.logger?.info("Parsed NYSE holiday schedule", {
      range,
      records: records.length,
      earlyCloses: records.filter((r) => r.closureKind === "EARLY_CLOSE").length,
    });

    return records;
  }
}

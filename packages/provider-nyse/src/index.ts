/**
 * @market-hours/provider-nyse
 *
 * Holiday schedule acquisition: NYSE page scrape and bundled fixture table
 */

import { FixtureScheduleSource } from "./fixtureSource.js";
import { NyseScheduleSource } from "./nyseSource.js";
import type { NyseSourceConfig, ScheduleSource, ScheduleSourceKind } from "./types.js";

export { NyseScheduleSource, NYSE_HOLIDAYS_URL } from "./nyseSource.js";
export { FixtureScheduleSource, DEFAULT_FIXTURE_PATH } from "./fixtureSource.js";
export { PageClient, DEFAULT_TIMEOUT_MS } from "./client.js";
export { parseNyseHolidayTable } from "./parse.js";
export { rawScheduleRecordSchema, parseRecords } from "./schema.js";
export { toAcquisitionError } from "./errors.js";
export type {
  ScheduleSource,
  ScheduleSourceKind,
  NyseSourceConfig,
  FixtureSourceConfig,
} from "./types.js";

export interface ScheduleSourceOptions extends NyseSourceConfig {
  kind: ScheduleSourceKind;
  fixturePath?: string;
}

/**
 * Build the configured schedule source.
 */
export function createScheduleSource(options: ScheduleSourceOptions): ScheduleSource {
  if (options.kind === "fixture") {
    return new FixtureScheduleSource({ filePath: options.fixturePath, logger: options.logger });
  }
  return new NyseScheduleSource(options);
}

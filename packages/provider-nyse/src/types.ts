/**
 * Type definitions for schedule acquisition sources.
 */

import type { AxiosInstance } from "axios";
import type { Logger } from "@market-hours/logger";
import type { RawScheduleRecord, YearRange } from "@market-hours/contracts";

/**
 * A source of holiday and early-close rows for a range of years.
 *
 * Implementations raise AcquisitionError for transport failures and
 * ParseError when the upstream data has an unrecognized shape.
 */
export interface ScheduleSource {
  /** Source name recorded with each refresh, e.g. "nyse" */
  readonly name: string;

  fetchSchedule(range: YearRange): Promise<RawScheduleRecord[]>;
}

export type ScheduleSourceKind = "nyse" | "fixture";

/**
 * NYSE source configuration.
 */
export interface NyseSourceConfig {
  /**
   * URL of the NYSE holidays & trading hours page.
   */
  url: string;

  /**
   * Request timeout in milliseconds.
   * Defaults to 30000 (30 seconds).
   */
  timeoutMs: number;

  /**
   * HTTP client; defaults to a fresh axios instance.
   */
  httpClient?: AxiosInstance;

  logger?: Logger;
}

export interface FixtureSourceConfig {
  /** Path to the JSON schedule file; defaults to the bundled table */
  filePath?: string;

  logger?: Logger;
}

/**
 * Schedule source backed by the bundled US equity holiday table.
 *
 * Used when the upstream page is unavailable or for offline environments.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { AcquisitionError, ParseError } from "@market-hours/contracts";
import type { RawScheduleRecord, YearRange } from "@market-hours/contracts";
import { fixtureFileSchema } from "./schema.js";
import type { FixtureSourceConfig, ScheduleSource } from "./types.js";

export const DEFAULT_FIXTURE_PATH = fileURLToPath(new URL("../data/us-equity-holidays.json", import.meta.url));

export class FixtureScheduleSource implements ScheduleSource {
  readonly name = "fixture";

  private readonly filePath: string;
  private readonly config: FixtureSourceConfig;

  constructor(config: FixtureSourceConfig = {}) {
    this.config = config;
    this.filePath = config.filePath ?? DEFAULT_FIXTURE_PATH;
  }

  /**
   * Records from the table whose date falls inside `range`.
   *
   * @throws AcquisitionError if the file cannot be read
   * @throws ParseError if it is not a valid schedule file
   */
  async fetchSchedule(range: YearRange): Promise<RawScheduleRecord[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (error) {
      throw new AcquisitionError(`Failed to read schedule file ${this.filePath}: ${String(error)}`, {
        source: this.name,
        reason: "io",
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Schedule file is not valid JSON: ${String(error)}`, {
        source: this.name,
        value: this.filePath,
      });
    }

    const result = fixtureFileSchema.safeParse(json);
    if (!result.success) {
      throw new ParseError(`Schedule file has an unexpected shape: ${result.error.issues[0]?.message ?? "unknown"}`, {
        source: this.name,
        value: this.filePath,
      });
    }

    const records = result.data.records.filter((r) => {
      const year = Number(r.date.slice(0, 4));
      return year >= range.startYear && year <= range.endYear;
    });

    this.config.logger?.info("Loaded bundled holiday schedule", {
      range,
      records: records.length,
      file: this.filePath,
    });

    return records;
  }
}

import { describe, it, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import axios, { AxiosError } from "axios";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import { AcquisitionError, ParseError } from "@market-hours/contracts";
import {
  NyseScheduleSource,
  FixtureScheduleSource,
  NYSE_HOLIDAYS_URL,
  createScheduleSource,
} from "../src/index.js";

const html = fs.readFileSync(new URL("./fixtures/nyse-holidays.html", import.meta.url), "utf-8");
const RANGE = { startYear: 2025, endYear: 2026 };

function respond(data: unknown, status = 200): AxiosAdapter {
  return async (config) => ({ data, status, statusText: String(status), headers: {}, config });
}

function nyse(adapter: AxiosAdapter, timeoutMs = 1000): NyseScheduleSource {
  return new NyseScheduleSource({
    url: NYSE_HOLIDAYS_URL,
    timeoutMs,
    httpClient: axios.create({ adapter }),
  });
}

async function acquisitionFailure(source: NyseScheduleSource): Promise<AcquisitionError> {
  try {
    await source.fetchSchedule(RANGE);
  } catch (error) {
    if (error instanceof AcquisitionError) return error;
    throw error;
  }
  throw new Error("expected fetchSchedule to fail");
}

describe("NyseScheduleSource", () => {
  it("fetches and parses the holidays page", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async (config) => {
      seen.push(config);
      return { data: html, status: 200, statusText: "OK", headers: {}, config };
    };

    const records = await nyse(adapter).fetchSchedule(RANGE);

    expect(records).toHaveLength(15);
    expect(seen[0]?.url).toBe(NYSE_HOLIDAYS_URL);
    expect(seen[0]?.timeout).toBe(1000);
    expect(seen[0]?.responseType).toBe("text");
  });

  it("fails with a timeout AcquisitionError when the server never answers", async () => {
    const error = await acquisitionFailure(nyse(() => new Promise(() => {}), 20));

    expect(error.message).toBe("Schedule request timed out after 20ms");
    expect(error.data?.["reason"]).toBe("timeout");
  });

  it("maps axios timeouts to the timeout reason", async () => {
    const error = await acquisitionFailure(
      nyse(async () => {
        throw new AxiosError("timeout of 1000ms exceeded", "ECONNABORTED");
      })
    );

    expect(error.data?.["reason"]).toBe("timeout");
  });

  it("maps non-2xx responses to http_status", async () => {
    const error = await acquisitionFailure(nyse(respond("Service Unavailable", 503)));

    expect(error.statusCode).toBe(503);
    expect(error.data?.["reason"]).toBe("http_status");
  });

  it("maps connection failures to network", async () => {
    const error = await acquisitionFailure(
      nyse(async () => {
        throw new AxiosError("getaddrinfo ENOTFOUND www.nyse.com", "ENOTFOUND");
      })
    );

    expect(error.data?.["reason"]).toBe("network");
    expect(error.message).toBe("Schedule request failed: getaddrinfo ENOTFOUND www.nyse.com");
  });

  it("raises ParseError, not AcquisitionError, for a changed page", async () => {
    await expect(nyse(respond("<html><body>Closed for redesign</body></html>")).fetchSchedule(RANGE)).rejects.toBeInstanceOf(
      ParseError
    );
    await expect(nyse(respond({ holidays: [] })).fetchSchedule(RANGE)).rejects.toBeInstanceOf(ParseError);
  });
});

describe("FixtureScheduleSource", () => {
  it("returns the bundled records for the range", async () => {
    const records = await new FixtureScheduleSource().fetchSchedule({ startYear: 2024, endYear: 2024 });

    expect(records).toHaveLength(13);
    expect(records[0]).toEqual({ date: "2024-01-01", name: "New Year's Day", closureKind: "FULL_CLOSURE" });
    expect(records.find((r) => r.date === "2024-07-03")).toEqual({
      date: "2024-07-03",
      name: "Day before Independence Day",
      closureKind: "EARLY_CLOSE",
      closeTime: "13:00",
    });
  });

  it("fails with AcquisitionError when the file is missing", async () => {
    const source = new FixtureScheduleSource({ filePath: path.join(os.tmpdir(), "missing-holidays.json") });

    await expect(source.fetchSchedule(RANGE)).rejects.toBeInstanceOf(AcquisitionError);
  });

  it("fails with ParseError for a malformed file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "fixture-source-"));
    const file = path.join(dir, "holidays.json");
    fs.writeFileSync(file, JSON.stringify({ source: "test", records: [{ date: "Jan 1", name: "x" }] }));

    try {
      await expect(new FixtureScheduleSource({ filePath: file }).fetchSchedule(RANGE)).rejects.toBeInstanceOf(ParseError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("createScheduleSource", () => {
  it("builds the configured kind", () => {
    const common = { url: NYSE_HOLIDAYS_URL, timeoutMs: 1000 };

    expect(createScheduleSource({ ...common, kind: "nyse" }).name).toBe("nyse");
    expect(createScheduleSource({ ...common, kind: "fixture" }).name).toBe("fixture");
  });
});

/**
 * Parser for the NYSE "Holidays & Trading Hours" page.
 *
 * Expected shape:
 * - a table whose header row reads `Holiday | 2025 | 2026 | ...`
 * - one row per holiday; each year cell holds the observed date as
 *   `Weekday, Month D` (optionally `, YYYY` when the observed date falls in
 *   another year), optionally followed by footnote markers (`*`, `**`, ...);
 *   a dash or blank cell means the holiday is not observed that year
 * - footnotes such as `** Each market will close early at 1:00 p.m. on
 *   Thursday, July 3, 2025.` that mark early-close days
 *
 * Anything else is a ParseError: the upstream format changed and retrying
 * will not help.
 */

import * as cheerio from "cheerio";
import moment from "moment-timezone";
import { ParseError } from "@market-hours/contracts";
import type { RawScheduleRecord, YearRange } from "@market-hours/contracts";
import { parseRecords } from "./schema.js";

const SOURCE = "nyse";

const CELL_DATE = /^(Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday),\s+([A-Za-z]+)\s+(\d{1,2})(?:,\s*(\d{4}))?\s*(\*+)?$/;
const FOOTNOTE = /^(\*+)\s*Each market will close early at (\d{1,2}):(\d{2})\s*([ap])\.?\s*m\.?/i;
const FOOTNOTE_DATE = /(Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday),\s+([A-Za-z]+)\s+(\d{1,2}),\s+(\d{4})/g;
const NOT_OBSERVED = /^[-–—]*$/;

interface MarkedHoliday {
  name: string;
  year: number;
}

function clean(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Strict date from its parts; the weekday must agree with the date.
 */
function toIsoDate(weekday: string, month: string, day: string, year: number, context: string): string {
  const parsed = moment(`${month} ${day} ${year}`, "MMMM D YYYY", true);
  if (!parsed.isValid()) {
    throw new ParseError(`Unrecognized date "${context}"`, { source: SOURCE, value: context });
  }
  if (parsed.format("dddd") !== weekday) {
    throw new ParseError(`Weekday does not match date in "${context}"`, { source: SOURCE, value: context });
  }
  return parsed.format("YYYY-MM-DD");
}

function to24Hour(hour: string, minute: string, meridiem: string): string {
  const h = Number(hour) % 12 + (meridiem.toLowerCase() === "p" ? 12 : 0);
  return `${String(h).padStart(2, "0")}:${minute}`;
}

function findHolidayTable($: cheerio.CheerioAPI): { years: number[]; rows: string[][] } {
  for (const table of $("table").toArray()) {
    const rows = $(table)
      .find("tr")
      .toArray()
      .map((tr) =>
        $(tr)
          .find("th, td")
          .toArray()
          .map((cell) => clean($(cell).text()))
      );

    const [header, ...body] = rows;
    if (!header || !/^holiday/i.test(header[0] ?? "")) {
      continue;
    }

    const yearCells = header.slice(1);
    if (yearCells.length === 0 || !yearCells.every((c) => /^\d{4}$/.test(c))) {
      throw new ParseError(`Holiday table header has unexpected columns: ${header.join(" | ")}`, {
        source: SOURCE,
        field: "header",
      });
    }

    return { years: yearCells.map(Number), rows: body.filter((r) => r.length > 0) };
  }

  throw new ParseError("No holiday table found in NYSE page", { source: SOURCE });
}

/**
 * Parse holidays and early closes for the years in `range`.
 *
 * @throws ParseError when the page does not have the expected shape
 *
 * @example
 * ```typescript
 * const records = parseNyseHolidayTable(html, { startYear: 2025, endYear: 2026 });
 * // [{ date: '2025-01-01', name: 'New Years Day', closureKind: 'FULL_CLOSURE' }, ...]
 * ```
 */
export function parseNyseHolidayTable(html: string, range: YearRange): RawScheduleRecord[] {
  const $ = cheerio.load(html);
  const { years, rows } = findHolidayTable($);

  if (!years.some((y) => y >= range.startYear && y <= range.endYear)) {
    throw new ParseError(
      `Holiday table covers ${years.join(", ")} but ${range.startYear}-${range.endYear} was requested`,
      { source: SOURCE, field: "header" }
    );
  }

  const records: RawScheduleRecord[] = [];
  const marked = new Map<string, MarkedHoliday[]>();

  for (const row of rows) {
    const name = clean((row[0] ?? "").replace(/\*+/g, ""));
    if (name.length === 0) {
      throw new ParseError("Holiday row without a name", { source: SOURCE, value: row.join(" | ") });
    }

    years.forEach((columnYear, i) => {
      const cell = clean((row[i + 1] ?? "").replace(/\([^)]*\)/g, ""));
      if (NOT_OBSERVED.test(cell)) {
        return;
      }

      const match = CELL_DATE.exec(cell);
      if (!match) {
        throw new ParseError(`Unrecognized holiday cell "${cell}" for ${name}`, {
          source: SOURCE,
          field: name,
          value: cell,
        });
      }

      const [, weekday = "", month = "", day = "", explicitYear, marker] = match;
      const year = explicitYear ? Number(explicitYear) : columnYear;
      const date = toIsoDate(weekday, month, day, year, cell);

      if (marker) {
        const list = marked.get(marker) ?? [];
        list.push({ name, year });
        marked.set(marker, list);
      }

      if (year >= range.startYear && year <= range.endYear) {
        records.push({ date, name, closureKind: "FULL_CLOSURE" });
      }
    });
  }

  const earlyDates = new Set<string>();
  $("p, li").each((_, el) => {
    const text = clean($(el).text());
    const footnote = FOOTNOTE.exec(text);
    if (!footnote) {
      return;
    }

    const [, marker = "", hour = "", minute = "", meridiem = ""] = footnote;
    const closeTime = to24Hour(hour, minute, meridiem);

    for (const [, weekday = "", month = "", day = "", yearText = ""] of text.matchAll(FOOTNOTE_DATE)) {
      const year = Number(yearText);
      const date = toIsoDate(weekday, month, day, year, `${weekday}, ${month} ${day}, ${yearText}`);
      if (year < range.startYear || year > range.endYear || earlyDates.has(date)) {
        continue;
      }
      earlyDates.add(date);

      const candidates = marked.get(marker) ?? [];
      const holiday = candidates.find((h) => h.year === year) ?? candidates[0];
      records.push({
        date,
        name: holiday ? `${holiday.name} (early close)` : "Early close",
        closureKind: "EARLY_CLOSE",
        closeTime,
      });
    }
  });

  return parseRecords(
    records.sort((a, b) => a.date.localeCompare(b.date)),
    SOURCE
  );
}

/**
 * zod schemas for the adapter's typed output contract.
 */

import { z } from "zod";
import { ParseError } from "@market-hours/contracts";
import type { RawScheduleRecord } from "@market-hours/contracts";

export const rawScheduleRecordSchema = z
  .object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD"),
    name: z.string().min(1),
    closureKind: z.enum(["FULL_CLOSURE", "EARLY_CLOSE"]),
    closeTime: z
      .string()
      .regex(/^\d{2}:\d{2}$/, "closeTime must be HH:MM")
      .optional(),
  })
  .strict();

export const fixtureFileSchema = z.object({
  source: z.string(),
  records: z.array(rawScheduleRecordSchema),
});

/**
 * Check adapter output against the RawScheduleRecord contract.
 *
 * @throws ParseError listing the first few schema issues
 */
export function parseRecords(value: unknown, source: string): RawScheduleRecord[] {
  const result = z.array(rawScheduleRecordSchema).safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ParseError(`Schedule records do not match the expected shape: ${issues.join("; ")}`, {
      source,
      issues,
    });
  }
  return result.data;
}

/**
 * Boundary timestamp format: wall-clock time read as UTC, second precision, no zone.
 * Parsing and formatting never consult the process zone, so a value survives a
 * round-trip unchanged even where local clocks skip or repeat an hour.
 */

import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

/**
 * `YYYY-MM-DD HH:MM:SS`, `YYYY-MM-DDTHH:MM:SS` or a bare `YYYY-MM-DD` (midnight).
 * date-fns `parse` builds its result in the process zone, so fields are read here
 * and assembled with Date.UTC.
 */
const INPUT_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?$/;

export function formatTimestamp(date: Date): string {
  return format(new UTCDate(date.getTime()), TIMESTAMP_FORMAT);
}

/** Parse a boundary timestamp. Returns null when the value is malformed or names no real instant. */
export function parseTimestamp(value: string): Date | null {
  const match = INPUT_PATTERN.exec(value.trim());
  if (!match) return null;

  const [year, month, day, hours = 0, minutes = 0, seconds = 0] = match
    .slice(1)
    .map((field) => (field === undefined ? undefined : Number(field)));
  if (year === undefined || month === undefined || day === undefined) return null;

  const parsed = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));

  // Date.UTC rolls 2024-02-30 over to March; reject anything that did not land on its own fields.
  const landed =
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day &&
    parsed.getUTCHours() === hours &&
    parsed.getUTCMinutes() === minutes &&
    parsed.getUTCSeconds() === seconds;
  return landed ? parsed : null;
}

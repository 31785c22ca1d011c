// ============================================================================
// DATE UTILITIES
// ============================================================================
// Every function takes the timezone explicitly. Nothing here reads the
// process timezone, so boundaries are reproducible in tests.

import { DateTime, IANAZone } from "luxon";

import { DailyTime } from "../types/index.js";

export interface DayBounds {
  start: Date; // inclusive
  end: Date; // exclusive, start of the next local day
}

export function isValidTimezone(timezone: string): boolean {
  return IANAZone.isValidZone(timezone);
}

/**
 * Local calendar day containing `now`, as [start, end) instants.
 */
export function dayBounds(now: Date, timezone: string): DayBounds {
  const start = DateTime.fromJSDate(now, { zone: timezone }).startOf("day");
  // plus({ days: 1 }) keeps 23h and 25h days correct across DST switches
  const end = start.plus({ days: 1 });
  return { start: start.toJSDate(), end: end.toJSDate() };
}

/**
 * Parse a due date coming from the model. Strings without an offset are
 * local wall-clock time in `timezone`. Anything unparseable is null.
 */
export function parseDueAt(value: unknown, timezone: string): Date | null {
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === "null") return null;

  let parsed = DateTime.fromISO(trimmed, { zone: timezone });
  if (!parsed.isValid) {
    parsed = DateTime.fromSQL(trimmed, { zone: timezone });
  }

  return parsed.isValid ? parsed.toJSDate() : null;
}

export function formatDueAt(date: Date, timezone: string): string {
  return DateTime.fromJSDate(date, { zone: timezone }).toFormat("yyyy-MM-dd HH:mm");
}

/**
 * Human and machine readable "now" for prompts, e.g.
 * "Sunday, 2025-06-01 10:00 (2025-06-01T10:00:00+02:00, Europe/Vienna)".
 */
export function describeReferenceTime(now: Date, timezone: string): string {
  const local = DateTime.fromJSDate(now, { zone: timezone }).setLocale("en");
  const iso = local.toISO({ suppressMilliseconds: true }) ?? now.toISOString();
  return `${local.toFormat("cccc, yyyy-MM-dd HH:mm")} (${iso}, ${timezone})`;
}

/**
 * Parse "HH:mm" (24-hour) into a daily fire time.
 */
export function parseDailyTime(value: string): DailyTime | null {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

export function formatDailyTime(time: DailyTime): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

import { isValid, parseISO } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";

/**
 * Floors a timestamp to the start of its snapshot interval.
 *
 * Every run inside the same interval gets the same observation time, so an
 * overlapping or retried run writes keys that already exist and is dropped.
 *
 * @example
 * floorToInterval(new Date("2026-10-19T10:47:12Z"), 30) // 2026-10-19T10:30:00.000Z
 */
export function floorToInterval(date: Date, intervalMinutes: number): Date {
  const intervalMs = intervalMinutes * 60 * 1000;
  return new Date(Math.floor(date.getTime() / intervalMs) * intervalMs);
}

export interface CalendarFields {
  /** 0 = Monday ... 6 = Sunday */
  dayOfWeek: number;
  /** 0-23 */
  hour: number;
  isWeekend: boolean;
}

/**
 * Day of week and hour of an instant in the park's local timezone.
 *
 * @example
 * // 2026-10-19 is a Monday; 10:30 UTC is 06:30 in New York (EDT)
 * getCalendarFields(new Date("2026-10-19T10:30:00Z"), "America/New_York")
 * // { dayOfWeek: 0, hour: 6, isWeekend: false }
 */
export function getCalendarFields(date: Date, timezone: string): CalendarFields {
  // ISO day of week: 1 = Monday ... 7 = Sunday
  const isoDay = parseInt(formatInTimeZone(date, timezone, "i"), 10);
  const hour = parseInt(formatInTimeZone(date, timezone, "H"), 10);
  const dayOfWeek = isoDay - 1;

  return { dayOfWeek, hour, isWeekend: dayOfWeek >= 5 };
}

/**
 * Parses an ISO-8601 timestamp sent by the API. Anything unparseable is null.
 */
export function parseSourceTimestamp(value: unknown): Date | null {
  if (typeof value !== "string" || value.trim() === "") {
    return null;
  }
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

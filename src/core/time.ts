import { MalformedTimestampError } from "./errors.js";

export const MS_PER_SECOND = 1000;
export const MS_PER_DAY = 86_400_000;

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

// Date, optional time with optional fraction, optional offset. No offset means UTC.
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function offsetMinutes(raw: string | undefined): number {
  if (!raw || raw === "Z" || raw === "z") {
    return 0;
  }

  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= lastDay;
}

/**
 * Parses an ISO 8601 timestamp to epoch milliseconds.
 *
 * Timestamps without an offset are read as UTC so the result never depends on
 * the timezone of the machine running the report.
 */
export function toInstant(value: unknown): number {
  if (typeof value !== "string") {
    throw new MalformedTimestampError(value);
  }

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new MalformedTimestampError(value);
  }

  const [, yearRaw, monthRaw, dayRaw, hourRaw, minuteRaw, secondRaw, fractionRaw, offsetRaw] =
    match;
  const year = Number(yearRaw);
  const month = Number(monthRaw);
  const day = Number(dayRaw);
  const hour = Number(hourRaw ?? 0);
  const minute = Number(minuteRaw ?? 0);
  const second = Number(secondRaw ?? 0);

  if (!isValidCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    throw new MalformedTimestampError(value);
  }

  // Sub-millisecond digits are kept as a fraction so ceil() still sees them.
  const fraction = fractionRaw ? Number(`0.${fractionRaw}`) * MS_PER_SECOND : 0;
  const utc = Date.UTC(year, month - 1, day, hour, minute, second) + fraction;
  return utc - offsetMinutes(offsetRaw) * 60_000;
}

export function parseInstant(value: unknown): number | null {
  try {
    return toInstant(value);
  } catch (error) {
    if (error instanceof MalformedTimestampError) {
      return null;
    }
    throw error;
  }
}

/** Whole seconds from `start` to `end`, rounded up and never negative. */
export function secondsBetween(start: number, end: number): number {
  // Snap to whole microseconds; sub-millisecond fractions carry float noise.
  const elapsedMs = Math.round((end - start) * 1000) / 1000;
  return Math.max(0, Math.ceil(elapsedMs / MS_PER_SECOND));
}

export function durationSeconds(start: unknown, end: unknown): number {
  return secondsBetween(toInstant(start), toInstant(end));
}

/** The calendar date as written in the timestamp, before any offset is applied. */
export function calendarDate(value: unknown): string {
  if (typeof value !== "string") {
    throw new MalformedTimestampError(value);
  }
  toInstant(value);
  return value.trim().slice(0, 10);
}

export function utcMidnight(date: string): number {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new MalformedTimestampError(date);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function dateOfInstant(instant: number): string {
  return new Date(instant).toISOString().slice(0, 10);
}

export function weekdayOf(date: string): Weekday {
  // getUTCDay(): Sunday = 0
  const index = (new Date(utcMidnight(date)).getUTCDay() + 6) % 7;
  return WEEKDAYS[index] ?? "Monday";
}

export function isWeekend(day: Weekday): boolean {
  return day === "Saturday" || day === "Sunday";
}

export function mondayOf(date: string): string {
  const midnight = utcMidnight(date);
  const offsetDays = WEEKDAYS.indexOf(weekdayOf(date));
  return dateOfInstant(midnight - offsetDays * MS_PER_DAY);
}

export function daysBetween(first: string, last: string): number {
  return Math.round((utcMidnight(last) - utcMidnight(first)) / MS_PER_DAY);
}

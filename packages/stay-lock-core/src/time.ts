import { addDays, differenceInCalendarDays, format, isValid, parseISO } from "date-fns";
import type { CalendarDate, LocalTime } from "./types.js";

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timeZone);
  if (cached) {
    return cached;
  }
  const created = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  });
  formatters.set(timeZone, created);
  return created;
}

type ZonedParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const values: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== "literal") {
      values[part.type] = part.value;
    }
  }
  return {
    year: Number(values.year),
    month: Number(values.month),
    day: Number(values.day),
    hour: Number(values.hour),
    minute: Number(values.minute),
    second: Number(values.second)
  };
}

function offsetMs(timeZone: string, instantMs: number): number {
  const parts = zonedParts(new Date(instantMs), timeZone);
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  return asUtc - Math.floor(instantMs / 1000) * 1000;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function isLocalTime(value: string): boolean {
  return TIME_PATTERN.test(value.trim());
}

export function parseLocalTime(value: string): LocalTime {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid time of day (expected HH:MM): ${value}`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function isCalendarDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parseISO(value));
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  return format(addDays(parseISO(date), days), "yyyy-MM-dd");
}

/** Whole calendar days from `base` to `target`; negative when `target` is earlier. */
export function calendarDaysBetween(target: CalendarDate, base: CalendarDate): number {
  return differenceInCalendarDays(parseISO(target), parseISO(base));
}

// Two passes so that a wall-clock time right after a DST switch picks up the new offset.
export function zonedDateTimeToUtc(date: CalendarDate, time: LocalTime, timeZone: string): Date {
  const [year, month, day] = date.split("-").map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  const wallClockMs = Date.UTC(year, month - 1, day, time.hour, time.minute, 0);
  const firstOffset = offsetMs(timeZone, wallClockMs);
  let instantMs = wallClockMs - firstOffset;
  const secondOffset = offsetMs(timeZone, instantMs);
  if (secondOffset !== firstOffset) {
    instantMs = wallClockMs - secondOffset;
  }
  return new Date(instantMs);
}

export function calendarDateInZone(instant: Date, timeZone: string): CalendarDate {
  const parts = zonedParts(instant, timeZone);
  return `${parts.year}-${pad(parts.month)}-${pad(parts.day)}`;
}

export function formatLocalDate(instant: Date, timeZone: string): string {
  const parts = zonedParts(instant, timeZone);
  return `${pad(parts.day)}.${pad(parts.month)}.${parts.year}`;
}

export function formatLocalDateTime(instant: Date, timeZone: string): string {
  const parts = zonedParts(instant, timeZone);
  return `${pad(parts.day)}.${pad(parts.month)}.${parts.year} ${pad(parts.hour)}:${pad(parts.minute)}`;
}

export function formatLocalTimestamp(instant: Date, timeZone: string): string {
  const parts = zonedParts(instant, timeZone);
  return `${formatLocalDateTime(instant, timeZone)}:${pad(parts.second)}`;
}

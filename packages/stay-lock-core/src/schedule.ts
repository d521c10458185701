import { addCalendarDays, calendarDateInZone, zonedDateTimeToUtc } from "./time.js";
import type { LocalTime } from "./types.js";

const MIN_SLEEP_MS = 60_000;
const FALLBACK_SLEEP_MS = 60 * 60 * 1000;

/** Next occurrence of `runTime` in `timeZone` strictly after `now`. */
export function nextRunAt(now: Date, runTime: LocalTime, timeZone: string): Date {
  const today = calendarDateInZone(now, timeZone);
  const todayRun = zonedDateTimeToUtc(today, runTime, timeZone);
  if (now.getTime() < todayRun.getTime()) {
    return todayRun;
  }
  return zonedDateTimeToUtc(addCalendarDays(today, 1), runTime, timeZone);
}

export function sleepMsUntilNextRun(now: Date, runTime: LocalTime, timeZone: string): number {
  const delay = nextRunAt(now, runTime, timeZone).getTime() - now.getTime();
  return delay < MIN_SLEEP_MS ? FALLBACK_SLEEP_MS : delay;
}

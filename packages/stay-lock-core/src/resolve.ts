import { addCalendarDays, calendarDaysBetween, zonedDateTimeToUtc } from "./time.js";
import type { AccessWindow, Booking, CalendarDate, LocalTime, ResolutionMode, ResolvedStay } from "./types.js";

export type ResolveArgs = {
  bookings: Booking[];
  today: CalendarDate;
  checkin: LocalTime;
  checkout: LocalTime;
  timeZone: string;
  mode?: ResolutionMode;
};

type Candidate = {
  booking: Booking;
  arrivesToday: boolean;
  daysUntilArrival: number;
};

export function isCurrent(booking: Booking, today: CalendarDate): boolean {
  return booking.arrival <= today && today < booking.departure;
}

export function isFuture(booking: Booking, today: CalendarDate): boolean {
  return booking.arrival >= today;
}

/** Some booking ends today while another one starts today. */
export function isTurnoverDay(bookings: Booking[], today: CalendarDate): boolean {
  return bookings.some((b) => b.departure === today) && bookings.some((b) => b.arrival === today);
}

function compareCandidates(mode: ResolutionMode) {
  return (a: Candidate, b: Candidate): number => {
    if (mode === "arrival-day" && a.arrivesToday !== b.arrivesToday) {
      return a.arrivesToday ? -1 : 1;
    }
    if (a.daysUntilArrival !== b.daysUntilArrival) {
      return a.daysUntilArrival - b.daysUntilArrival;
    }
    return a.booking.arrival.localeCompare(b.booking.arrival);
  };
}

export function selectBooking(bookings: Booking[], today: CalendarDate, mode: ResolutionMode = "current-or-next"): Booking | null {
  const candidates: Candidate[] = [];
  for (const booking of bookings) {
    if (isCurrent(booking, today)) {
      candidates.push({ booking, arrivesToday: booking.arrival === today, daysUntilArrival: 0 });
      continue;
    }
    if (isFuture(booking, today)) {
      candidates.push({
        booking,
        arrivesToday: booking.arrival === today,
        daysUntilArrival: calendarDaysBetween(booking.arrival, today)
      });
    }
  }

  const [best] = candidates.sort(compareCandidates(mode));
  return best ? best.booking : null;
}

export function stayWindow(booking: Booking, checkin: LocalTime, checkout: LocalTime, timeZone: string): AccessWindow {
  const start = zonedDateTimeToUtc(booking.arrival, checkin, timeZone);
  let end = zonedDateTimeToUtc(booking.departure, checkout, timeZone);
  if (end.getTime() <= start.getTime()) {
    end = zonedDateTimeToUtc(addCalendarDays(booking.departure, 1), checkout, timeZone);
  }
  return { start, end };
}

export function resolveStay(args: ResolveArgs): ResolvedStay {
  const booking = selectBooking(args.bookings, args.today, args.mode);
  return {
    booking,
    window: booking ? stayWindow(booking, args.checkin, args.checkout, args.timeZone) : null,
    turnover: isTurnoverDay(args.bookings, args.today)
  };
}

export function resolve(args: ResolveArgs): AccessWindow | null {
  return resolveStay(args).window;
}

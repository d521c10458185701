import { Store } from "@tanstack/store";
import { ConfigurationError, SourceError, StayLockError, describeError } from "./errors.js";
import { reconcileUnit } from "./reconcile.js";
import { resolveStay } from "./resolve.js";
import type {
  Booking,
  BookingSource,
  CalendarDate,
  LockAuthStore,
  Logger,
  RunOutcome,
  SyncSettings,
  UnitConfig,
  UnitResult
} from "./types.js";

function assertUnitComplete(unit: UnitConfig): void {
  const missing: string[] = [];
  if (!unit.bookingFileId) {
    missing.push("bookingFileId");
  }
  if (!Number.isInteger(unit.lockId) || unit.lockId <= 0) {
    missing.push("lockId");
  }
  if (!unit.authName.trim()) {
    missing.push("authName");
  }
  if (missing.length > 0) {
    throw new ConfigurationError(`Unit ${unit.unitId} is missing ${missing.join(", ")}`);
  }
}

async function fetchBookings(source: BookingSource, unit: UnitConfig): Promise<Booking[]> {
  try {
    return await source.fetch(unit.bookingFileId);
  } catch (error) {
    if (error instanceof StayLockError) {
      throw error;
    }
    throw new SourceError(`Bookings for ${unit.displayName} could not be loaded: ${describeError(error)}`, { cause: error });
  }
}

async function runUnit(args: {
  unit: UnitConfig;
  source: BookingSource;
  store: LockAuthStore;
  settings: SyncSettings;
  today: CalendarDate;
  logger?: Logger;
}): Promise<UnitResult> {
  const { unit, source, store, settings, today, logger } = args;
  try {
    assertUnitComplete(unit);
    const bookings = await fetchBookings(source, unit);
    const stay = resolveStay({
      bookings,
      today,
      checkin: settings.checkin,
      checkout: settings.checkout,
      timeZone: settings.timeZone,
      mode: settings.resolutionMode
    });
    const note = settings.resolutionMode === "arrival-day" && stay.turnover ? " (turnover day)" : "";
    const outcome = await reconcileUnit({ unit, desired: stay.window, store, settings, logger, note });
    return { unitId: unit.unitId, ok: true, outcome, lines: outcome.lines };
  } catch (error) {
    return { unitId: unit.unitId, ok: false, error, lines: [`[ERR] ${unit.displayName}: ${describeError(error)}`] };
  }
}

export async function runAll(args: {
  units: UnitConfig[];
  source: BookingSource;
  store: LockAuthStore;
  settings: SyncSettings;
  today: CalendarDate;
  logger?: Logger;
}): Promise<RunOutcome> {
  const { units, logger } = args;
  const state = new Store<RunOutcome>({ hadError: false, summaryLines: [], results: [] });

  for (const unit of units) {
    const result = await runUnit({ ...args, unit });
    for (const line of result.lines) {
      if (result.ok) {
        logger?.info(line);
      } else {
        logger?.error(line);
      }
    }
    state.setState((prev) => ({
      hadError: prev.hadError || !result.ok,
      summaryLines: [...prev.summaryLines, ...result.lines],
      results: [...prev.results, result]
    }));
  }

  return state.state;
}

export type ResolutionMode = "current-or-next" | "arrival-day";

/** Calendar day as `yyyy-MM-dd`, with no time zone attached. */
export type CalendarDate = string;

export type LocalTime = {
  hour: number;
  minute: number;
};

export type Booking = {
  arrival: CalendarDate;
  departure: CalendarDate;
};

export type AccessWindow = {
  start: Date;
  end: Date;
};

export type UnitConfig = {
  unitId: string;
  displayName: string;
  authName: string;
  bookingFileId: string;
  lockId: number;
  provisioningPin: string | null;
};

export type SyncSettings = {
  readonly timeZone: string;
  readonly checkin: LocalTime;
  readonly checkout: LocalTime;
  readonly resolutionMode: ResolutionMode;
  readonly forceSyncAfterChange: boolean;
  readonly dryRun: boolean;
};

export const KEYPAD_CODE_KIND = 13;
export const ALL_WEEKDAYS = 127;

export type AuthorizationEntry = {
  authId: string;
  name: string;
  kind: number;
  currentWindow: AccessWindow | null;
  /** Only one of the two bounds is set on the lock; such a half-open window is never a valid stay. */
  openBound: boolean;
};

export interface LockAuthStore {
  list(lockId: number): Promise<AuthorizationEntry[]>;
  create(args: { lockId: number; name: string; pin: string; weekdayMask: number }): Promise<AuthorizationEntry | null>;
  setWindow(args: { lockId: number; authId: string; start: Date | null; end: Date | null }): Promise<void>;
  forceSync?(lockId: number): Promise<void>;
}

export interface BookingSource {
  fetch(fileId: string): Promise<Booking[]>;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type ResolvedStay = {
  window: AccessWindow | null;
  booking: Booking | null;
  turnover: boolean;
};

export type WindowAction =
  | { type: "update"; authId: string; window: AccessWindow }
  | { type: "clear"; authId: string }
  | { type: "already_correct"; window: AccessWindow }
  | { type: "already_disabled" };

export type ReconcileOutcome = {
  action: WindowAction["type"];
  created: boolean;
  writes: number;
  message: string;
  lines: string[];
};

export type UnitResult =
  | { unitId: string; ok: true; outcome: ReconcileOutcome; lines: string[] }
  | { unitId: string; ok: false; error: unknown; lines: string[] };

export type RunOutcome = {
  hadError: boolean;
  summaryLines: string[];
  results: UnitResult[];
};

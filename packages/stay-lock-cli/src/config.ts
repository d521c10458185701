import { readFileSync } from "node:fs";
import {
  isLocalTime,
  isValidTimeZone,
  parseLocalTime,
  type LocalTime,
  type ResolutionMode,
  type SyncSettings,
  type UnitConfig
} from "@stay-lock/core";

export type Config = {
  timeZone?: string;
  checkinTime?: string;
  checkoutTime?: string;
  runTime?: string;
  resolutionMode?: ResolutionMode;
  columns?: {
    arrival?: string;
    departure?: string;
  };
  headerScanRows?: number;
  lock?: {
    baseUrl?: string;
    timeoutMs?: number;
    forceSyncAfterChange?: boolean;
  };
  bookings: {
    source: "drive" | "directory";
    tokenPath?: string;
    directory?: string;
    timeoutMs?: number;
  };
  report?: {
    subjectPrefix?: string;
    mailTo?: string;
    mailFrom?: string;
    smtp?: {
      host?: string;
      port?: number;
      user?: string;
      starttls?: boolean;
    };
  };
  logging?: {
    directory?: string;
    retentionDays?: number;
  };
  units: UnitEntry[];
};

export type UnitEntry = {
  id: string;
  name?: string;
  authName?: string;
  bookingFileId: string;
  lockId: number;
  pin?: string;
};

export type Secrets = {
  lockApiToken: string;
  smtpPassword?: string;
};

export const DEFAULTS = {
  timeZone: "Europe/Amsterdam",
  checkinTime: "15:00",
  checkoutTime: "11:00",
  runTime: "05:00",
  resolutionMode: "current-or-next",
  arrivalColumn: "Aankomstdatum",
  departureColumn: "Vertrekdatum",
  headerScanRows: 40,
  lockBaseUrl: "https://api.nuki.io",
  lockTimeoutMs: 20_000,
  downloadTimeoutMs: 60_000,
  logRetentionDays: 30,
  authName: "Guests",
  subjectPrefix: "Stay Lock Sync Report",
  smtpPort: 587
} as const;

const PIN_PATTERN = /^[1-9]{6}$/;

export function loadConfig(path: string): Config {
  const raw = readFileSync(path, "utf8");
  return JSON.parse(raw) as Config;
}

export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  for (const key of ["checkinTime", "checkoutTime", "runTime"] as const) {
    const value = config[key];
    if (value !== undefined && !isLocalTime(value)) {
      errors.push(`${key} must be HH:MM (00:00-23:59)`);
    }
  }

  if (config.timeZone !== undefined && !isValidTimeZone(config.timeZone)) {
    errors.push(`timeZone is not a known time zone: ${config.timeZone}`);
  }

  if (config.resolutionMode && !["current-or-next", "arrival-day"].includes(config.resolutionMode)) {
    errors.push("resolutionMode must be current-or-next|arrival-day");
  }

  if (config.headerScanRows !== undefined && config.headerScanRows < 1) {
    errors.push("headerScanRows must be >= 1");
  }

  if (config.lock?.timeoutMs !== undefined && config.lock.timeoutMs < 1000) {
    errors.push("lock.timeoutMs must be >= 1000");
  }

  if (config.bookings?.timeoutMs !== undefined && config.bookings.timeoutMs < 1000) {
    errors.push("bookings.timeoutMs must be >= 1000");
  }

  const retentionDays = config.logging?.retentionDays;
  if (retentionDays !== undefined && (!Number.isInteger(retentionDays) || retentionDays < 1)) {
    errors.push("logging.retentionDays must be a positive integer");
  }

  if (!config.bookings || !["drive", "directory"].includes(config.bookings.source)) {
    errors.push("bookings.source must be drive|directory");
  } else if (config.bookings.source === "drive" && !config.bookings.tokenPath) {
    errors.push("bookings.tokenPath is required when bookings.source is drive");
  } else if (config.bookings.source === "directory" && !config.bookings.directory) {
    errors.push("bookings.directory is required when bookings.source is directory");
  }

  if (config.report?.mailTo && !config.report.smtp?.host) {
    errors.push("report.smtp.host is required when report.mailTo is set");
  }

  if (!Array.isArray(config.units) || config.units.length === 0) {
    errors.push("config.units must be a non-empty array");
    return errors;
  }

  const ids = new Set<string>();
  for (const [index, unit] of config.units.entries()) {
    if (!unit.id) {
      errors.push(`units[${index}].id is required`);
    } else if (ids.has(unit.id)) {
      errors.push(`units[${index}].id must be unique: ${unit.id}`);
    } else {
      ids.add(unit.id);
    }

    if (!unit.bookingFileId) {
      errors.push(`units[${index}].bookingFileId is required`);
    }

    if (unit.lockId === undefined) {
      errors.push(`units[${index}].lockId is required`);
    } else if (!Number.isInteger(unit.lockId) || unit.lockId <= 0) {
      errors.push(`units[${index}].lockId must be a positive integer`);
    }

    if (unit.pin !== undefined && !PIN_PATTERN.test(unit.pin)) {
      errors.push(`units[${index}].pin must be 6 digits from 1-9`);
    }
  }

  return errors;
}

export function loadSecrets(env: NodeJS.ProcessEnv): Secrets {
  const lockApiToken = env.LOCK_API_TOKEN?.trim();
  if (!lockApiToken) {
    throw new Error("LOCK_API_TOKEN is not set");
  }
  const smtpPassword = env.SMTP_PASSWORD;
  return smtpPassword ? { lockApiToken, smtpPassword } : { lockApiToken };
}

export function toSettings(config: Config, options: { dryRun?: boolean } = {}): SyncSettings {
  return Object.freeze({
    timeZone: config.timeZone ?? DEFAULTS.timeZone,
    checkin: parseLocalTime(config.checkinTime ?? DEFAULTS.checkinTime),
    checkout: parseLocalTime(config.checkoutTime ?? DEFAULTS.checkoutTime),
    resolutionMode: config.resolutionMode ?? DEFAULTS.resolutionMode,
    forceSyncAfterChange: config.lock?.forceSyncAfterChange ?? false,
    dryRun: options.dryRun ?? false
  });
}

export function runTimeOf(config: Config): LocalTime {
  return parseLocalTime(config.runTime ?? DEFAULTS.runTime);
}

export function toUnits(config: Config): UnitConfig[] {
  return config.units.map((unit) => ({
    unitId: unit.id,
    displayName: unit.name?.trim() || `Apartment ${unit.id}`,
    authName: unit.authName?.trim() || DEFAULTS.authName,
    bookingFileId: unit.bookingFileId,
    lockId: unit.lockId,
    provisioningPin: unit.pin ?? null
  }));
}

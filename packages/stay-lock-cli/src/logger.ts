import { appendFileSync, mkdirSync, readdirSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import {
  calendarDateInZone,
  calendarDaysBetween,
  describeError,
  formatLocalTimestamp,
  isCalendarDate,
  type Logger
} from "@stay-lock/core";

type Level = "INFO" | "WARNING" | "ERROR";

const LOG_FILE_PATTERN = /^stay-lock-(\d{4}-\d{2}-\d{2})\.log$/;

export function logFileName(now: Date, timeZone: string): string {
  return `stay-lock-${calendarDateInZone(now, timeZone)}.log`;
}

export function formatLogLine(level: Level, message: string, now: Date, timeZone: string): string {
  return `${formatLocalTimestamp(now, timeZone)} ${level}: ${message}`;
}

/**
 * Console logger with timestamps in the configured zone. When `directory` is set, every line is
 * also appended to that day's log file. A failed file write never reaches the caller: the line
 * still goes to the console and the first failure is reported once on stderr.
 */
export function createLogger(options: { timeZone: string; directory?: string; now?: () => Date }): Logger {
  const now = options.now ?? (() => new Date());
  if (options.directory) {
    mkdirSync(options.directory, { recursive: true });
  }
  let fileFailureReported = false;

  const appendToFile = (directory: string, at: Date, line: string): void => {
    try {
      appendFileSync(join(directory, logFileName(at, options.timeZone)), `${line}\n`, "utf8");
    } catch (error) {
      if (!fileFailureReported) {
        fileFailureReported = true;
        console.error(`Log file write failed, logging to console only: ${describeError(error)}`);
      }
    }
  };

  const write = (level: Level, message: string): void => {
    const at = now();
    const line = formatLogLine(level, message, at, options.timeZone);
    if (level === "INFO") {
      console.log(line);
    } else {
      console.error(line);
    }
    if (options.directory) {
      appendToFile(options.directory, at, line);
    }
  };

  return {
    info: (message) => write("INFO", message),
    warn: (message) => write("WARNING", message),
    error: (message) => write("ERROR", message)
  };
}

/** Deletes daily log files more than `retentionDays` days older than today. Returns the removed names. */
export function pruneLogs(options: {
  directory: string;
  retentionDays: number;
  timeZone: string;
  now: Date;
  logger?: Logger;
}): string[] {
  const today = calendarDateInZone(options.now, options.timeZone);
  let names: string[];
  try {
    names = readdirSync(options.directory);
  } catch (error) {
    options.logger?.warn(`Log cleanup skipped: ${describeError(error)}`);
    return [];
  }

  const removed: string[] = [];
  for (const name of names.sort()) {
    const day = LOG_FILE_PATTERN.exec(name)?.[1];
    if (!day || !isCalendarDate(day) || calendarDaysBetween(today, day) <= options.retentionDays) {
      continue;
    }
    try {
      unlinkSync(join(options.directory, name));
      removed.push(name);
    } catch (error) {
      options.logger?.warn(`Could not remove old log file ${name}: ${describeError(error)}`);
    }
  }
  if (removed.length > 0) {
    options.logger?.info(`Removed ${removed.length} log file(s) older than ${options.retentionDays} days`);
  }
  return removed;
}

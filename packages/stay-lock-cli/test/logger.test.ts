import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runAll, type BookingSource, type SyncSettings, type UnitConfig } from "@stay-lock/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { FakeLockStore } from "../../stay-lock-core/test/fakeLockStore.js";
import { createLogger, formatLogLine, logFileName, pruneLogs } from "../src/logger.js";

const timeZone = "Europe/Amsterdam";
const now = new Date("2025-06-10T08:15:30.000Z");

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "stay-lock-"));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("prefixes lines with the local timestamp and level", () => {
    expect(formatLogLine("INFO", "hello", now, timeZone)).toBe("10.06.2025 10:15:30 INFO: hello");
    expect(logFileName(now, timeZone)).toBe("stay-lock-2025-06-10.log");
  });

  it("writes info to stdout and errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger({ timeZone, now: () => now });

    logger.info("all good");
    logger.warn("sync skipped");

    expect(log).toHaveBeenCalledWith("10.06.2025 10:15:30 INFO: all good");
    expect(error).toHaveBeenCalledWith("10.06.2025 10:15:30 WARNING: sync skipped");
  });

  it("appends to the day's log file when a directory is set", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const directory = join(tempDir(), "log");
    const logger = createLogger({ timeZone, directory, now: () => now });

    logger.info("first");
    logger.error("second");

    expect(readFileSync(join(directory, "stay-lock-2025-06-10.log"), "utf8")).toBe(
      "10.06.2025 10:15:30 INFO: first\n10.06.2025 10:15:30 ERROR: second\n"
    );
  });

  it("keeps every unit running when the log file can no longer be written", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const directory = join(tempDir(), "log");
    const logger = createLogger({ timeZone, directory, now: () => now });
    rmSync(directory, { recursive: true, force: true });

    const store = new FakeLockStore();
    store.seed(101, { name: "Guests" });
    store.seed(202, { name: "Guests" });
    const units: UnitConfig[] = [
      { unitId: "a1", displayName: "Apartment 1", authName: "Guests", bookingFileId: "file-1", lockId: 101, provisioningPin: null },
      { unitId: "a2", displayName: "Apartment 2", authName: "Guests", bookingFileId: "file-2", lockId: 202, provisioningPin: null }
    ];
    const source: BookingSource = { fetch: () => Promise.resolve([{ arrival: "2025-06-10", departure: "2025-06-12" }]) };
    const settings: SyncSettings = {
      timeZone,
      checkin: { hour: 15, minute: 0 },
      checkout: { hour: 11, minute: 0 },
      resolutionMode: "current-or-next",
      forceSyncAfterChange: false,
      dryRun: false
    };

    const outcome = await runAll({ units, source, store, settings, today: "2025-06-01", logger });

    expect(outcome.hadError).toBe(false);
    expect(store.writes()).toHaveLength(2);
    expect(log).toHaveBeenCalledWith(
      "10.06.2025 10:15:30 INFO: [OK] Apartment 2: code 'Guests' set valid from 10.06.2025 15:00 to 12.06.2025 11:00"
    );
    const notices = error.mock.calls.filter(
      ([message]) => typeof message === "string" && message.startsWith("Log file write failed, logging to console only: ENOENT")
    );
    expect(notices).toHaveLength(1);
  });
});

describe("pruneLogs", () => {
  it("removes daily log files older than the retention period", () => {
    const directory = tempDir();
    for (const name of [
      "stay-lock-2025-05-01.log",
      "stay-lock-2025-05-10.log",
      "stay-lock-2025-05-11.log",
      "stay-lock-2025-06-10.log",
      "other-2025-01-01.log",
      "notes.txt"
    ]) {
      writeFileSync(join(directory, name), "x\n");
    }
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const removed = pruneLogs({ directory, retentionDays: 30, timeZone, now, logger });

    expect(removed).toEqual(["stay-lock-2025-05-01.log", "stay-lock-2025-05-10.log"]);
    expect(readdirSync(directory).sort()).toEqual([
      "notes.txt",
      "other-2025-01-01.log",
      "stay-lock-2025-05-11.log",
      "stay-lock-2025-06-10.log"
    ]);
    expect(logger.info).toHaveBeenCalledWith("Removed 2 log file(s) older than 30 days");
  });

  it("warns instead of throwing when the directory is missing", () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    expect(pruneLogs({ directory: join(tempDir(), "missing"), retentionDays: 30, timeZone, now, logger })).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

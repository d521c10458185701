import { existsSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Booking, BookingSource, RunReport } from "@stay-lock/core";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { FakeLockStore } from "../../stay-lock-core/test/fakeLockStore.js";
import { DRIVE_READONLY_SCOPE, readAuthorizedUserFile } from "../src/bookingSource.js";
import { runCli, runDaemon, type CliDeps, type RunContext } from "../src/cli.js";
import { toSettings, toUnits, type Config } from "../src/config.js";
import type { AuthCodeClient } from "../src/driveAuth.js";
import type { ReportSink } from "../src/mailer.js";

const config: Config = {
  timeZone: "Europe/Amsterdam",
  bookings: { source: "directory", directory: "./bookings" },
  units: [
    { id: "a1", name: "Apartment 1", bookingFileId: "file-1", lockId: 101 },
    { id: "a2", name: "Apartment 2", bookingFileId: "file-2", lockId: 202 }
  ]
};

const bookings: Record<string, Booking[]> = {
  "file-2": [{ arrival: "2025-06-10", departure: "2025-06-12" }]
};

const source: BookingSource = {
  fetch: (fileId) => {
    const rows = bookings[fileId];
    return rows ? Promise.resolve(rows) : Promise.reject(new Error("spreadsheet offline"));
  }
};

function setup(overrides: Partial<CliDeps> = {}) {
  const store = new FakeLockStore();
  store.seed(202, { name: "Guests" });
  const sent: RunReport[] = [];
  const sink: ReportSink = {
    send: (report) => {
      sent.push(report);
      return Promise.resolve();
    }
  };
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const deps: CliDeps = {
    loadConfig: () => config,
    env: { LOCK_API_TOKEN: "test-token" },
    createStore: () => store,
    createSource: () => source,
    createSink: () => sink,
    createLogger: () => logger,
    now: () => new Date("2025-06-01T08:00:00.000Z"),
    sleep: () => Promise.resolve(),
    prompt: () => Promise.reject(new Error("no terminal in tests")),
    createAuthClient: () => {
      throw new Error("no OAuth client in tests");
    },
    ...overrides
  };
  return { deps, store, sent, logger };
}

let errorSpy: MockInstance<typeof console.error>;
let logSpy: MockInstance<typeof console.log>;

beforeEach(() => {
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runCli --once", () => {
  it("exits 0 after a pass even when a unit failed, and reports both units", async () => {
    const { deps, sent, store } = setup();

    const code = await runCli(["node", "stay-lock", "--once"], deps);

    expect(code).toBe(0);
    expect(sent).toEqual([
      {
        subject: "ERROR - Stay Lock Sync Report - 01.06.2025",
        body:
          "[ERR] Apartment 1: Bookings for Apartment 1 could not be loaded: spreadsheet offline\n\n" +
          "[OK] Apartment 2: code 'Guests' set valid from 10.06.2025 15:00 to 12.06.2025 11:00"
      }
    ]);
    expect(store.writes()).toHaveLength(1);
  });

  it("writes nothing with --dry-run", async () => {
    const { deps, sent, store } = setup();

    const code = await runCli(["node", "stay-lock", "--once", "--dry-run"], deps);

    expect(code).toBe(0);
    expect(store.writes()).toEqual([]);
    expect(sent[0]?.body).toContain("[DRY-RUN] [OK] Apartment 2: code 'Guests' set valid from 10.06.2025 15:00 to 12.06.2025 11:00");
  });

  it("keeps exit code 0 when the report cannot be delivered", async () => {
    const failingSink: ReportSink = { send: () => Promise.reject(new Error("smtp down")) };
    const { deps, logger } = setup({ createSink: () => failingSink });

    const code = await runCli(["node", "stay-lock", "--once"], deps);

    expect(code).toBe(0);
    expect(logger.error).toHaveBeenCalledWith("[ERR] Report delivery failed: smtp down");
  });

  it("removes expired log files before the pass", async () => {
    const directory = mkdtempSync(join(tmpdir(), "stay-lock-"));
    writeFileSync(join(directory, "stay-lock-2025-05-01.log"), "old\n");
    writeFileSync(join(directory, "stay-lock-2025-05-31.log"), "recent\n");
    const { deps } = setup({ loadConfig: () => ({ ...config, logging: { directory, retentionDays: 7 } }) });

    expect(await runCli(["node", "stay-lock", "--once"], deps)).toBe(0);

    expect(existsSync(join(directory, "stay-lock-2025-05-01.log"))).toBe(false);
    expect(existsSync(join(directory, "stay-lock-2025-05-31.log"))).toBe(true);
  });

  it("exits 1 on an invalid config without touching the lock", async () => {
    const createStore = vi.fn();
    const { deps } = setup({ loadConfig: () => ({ ...config, units: [] }), createStore });

    const code = await runCli(["node", "stay-lock", "--once"], deps);

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("ERROR: config.units must be a non-empty array");
    expect(createStore).not.toHaveBeenCalled();
  });

  it("exits 1 when the lock API token is missing", async () => {
    const { deps } = setup({ env: {} });

    expect(await runCli(["node", "stay-lock", "--once"], deps)).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("ERROR: LOCK_API_TOKEN is not set");
  });
});

describe("runCli validate-config", () => {
  it("prints a confirmation for a valid file", async () => {
    const { deps } = setup();

    expect(await runCli(["node", "stay-lock", "--config", "custom.json", "validate-config"], deps)).toBe(0);
    expect(logSpy).toHaveBeenCalledWith("Config valid");
  });
});

describe("runDaemon", () => {
  it("sleeps until the next run time and stops when aborted", async () => {
    const { store, logger } = setup();
    const housekeeping = vi.fn();
    const controller = new AbortController();
    const sleep = vi.fn((_ms: number, _signal: AbortSignal) => {
      controller.abort();
      return Promise.reject(new Error("The operation was aborted"));
    });
    const ctx: RunContext = {
      config,
      settings: toSettings(config),
      units: toUnits(config),
      runTime: { hour: 5, minute: 0 },
      store,
      source,
      sink: null,
      logger,
      now: () => new Date("2025-06-01T08:00:00.000Z"),
      housekeeping
    };

    const passes = await runDaemon(ctx, { sleep }, controller.signal);

    expect(passes).toBe(1);
    expect(housekeeping).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(19 * 60 * 60 * 1000, controller.signal);
    expect(logger.info).toHaveBeenCalledWith("Next run at 02.06.2025 05:00");
    expect(logger.info).toHaveBeenLastCalledWith("Stopped after 1 pass(es), 1 with errors");
  });
});

describe("runCli authorize-drive", () => {
  it("exchanges the pasted code and writes a token file the Drive loader accepts", async () => {
    const directory = mkdtempSync(join(tmpdir(), "stay-lock-"));
    writeFileSync(
      join(directory, "client_secret_test.json"),
      JSON.stringify({ installed: { client_id: "test-client", client_secret: "test-secret", redirect_uris: ["http://localhost"] } })
    );
    const client: AuthCodeClient = {
      generateAuthUrl: vi.fn(() => "https://accounts.example.test/consent"),
      getToken: vi.fn(() => Promise.resolve({ tokens: { refresh_token: "test-refresh", access_token: "test-access" } }))
    };
    const { deps } = setup({
      prompt: () => Promise.resolve("http://localhost/?code=test-code&scope=drive"),
      createAuthClient: () => client
    });
    const tokenPath = join(directory, "token.json");

    expect(await runCli(["node", "stay-lock", "authorize-drive", "--token", tokenPath], deps)).toBe(0);

    expect(client.generateAuthUrl).toHaveBeenCalledWith({ access_type: "offline", prompt: "consent", scope: [DRIVE_READONLY_SCOPE] });
    expect(client.getToken).toHaveBeenCalledWith("test-code");
    await expect(readAuthorizedUserFile(tokenPath)).resolves.toEqual({
      type: "authorized_user",
      client_id: "test-client",
      client_secret: "test-secret",
      refresh_token: "test-refresh",
      token: "test-access"
    });
  });

  it("exits 1 when no client secret file is present", async () => {
    const directory = mkdtempSync(join(tmpdir(), "stay-lock-"));
    const { deps } = setup();

    expect(await runCli(["node", "stay-lock", "authorize-drive", "--token", join(directory, "token.json")], deps)).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(`ERROR: No client_secret*.json found in ${directory}`);
  });
});

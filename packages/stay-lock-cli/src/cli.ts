import { dirname } from "node:path";
import { createInterface } from "node:readline/promises";
import { setTimeout as sleepFor } from "node:timers/promises";
import { Command, CommanderError } from "commander";
import { Store } from "@tanstack/store";
import {
  ConfigurationError,
  calendarDateInZone,
  describeError,
  formatLocalDateTime,
  formatReport,
  runAll,
  sleepMsUntilNextRun,
  type BookingSource,
  type LocalTime,
  type LockAuthStore,
  type Logger,
  type RunOutcome,
  type SyncSettings,
  type UnitConfig
} from "@stay-lock/core";
import {
  DEFAULTS,
  loadConfig,
  loadSecrets,
  runTimeOf,
  toSettings,
  toUnits,
  validateConfig,
  type Config,
  type Secrets
} from "./config.js";
import { DirectoryWorkbookLoader, DriveWorkbookLoader, WorkbookBookingSource, type WorkbookLoader } from "./bookingSource.js";
import { authorizeDrive, createAuthCodeClient, findClientSecretFile, type AuthCodeClient, type ClientSecret } from "./driveAuth.js";
import { createLogger, pruneLogs } from "./logger.js";
import { createReportSink, deliverReport, type ReportSink } from "./mailer.js";
import { NukiLockClient } from "./nukiClient.js";

export type CliDeps = {
  loadConfig: (path: string) => Config;
  env: NodeJS.ProcessEnv;
  createStore: (config: Config, secrets: Secrets) => LockAuthStore;
  createSource: (config: Config) => BookingSource;
  createSink: (config: Config, secrets: Secrets) => ReportSink | null;
  createLogger: (config: Config) => Logger;
  now: () => Date;
  sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  prompt: (question: string) => Promise<string>;
  createAuthClient: (secret: ClientSecret) => AuthCodeClient;
};

export type RunContext = {
  config: Config;
  settings: SyncSettings;
  units: UnitConfig[];
  runTime: LocalTime;
  store: LockAuthStore;
  source: BookingSource;
  sink: ReportSink | null;
  logger: Logger;
  now: () => Date;
  /** Runs before each pass; removes expired log files. */
  housekeeping: () => void;
};

function lockTimeout(config: Config): number {
  return config.lock?.timeoutMs ?? DEFAULTS.lockTimeoutMs;
}

function downloadTimeout(config: Config): number {
  return config.bookings.timeoutMs ?? DEFAULTS.downloadTimeoutMs;
}

async function promptLine(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

function workbookLoader(config: Config): WorkbookLoader {
  if (config.bookings.source === "directory") {
    return new DirectoryWorkbookLoader(config.bookings.directory ?? ".");
  }
  return new DriveWorkbookLoader({ tokenPath: config.bookings.tokenPath ?? "token.json", timeoutMs: downloadTimeout(config) });
}

export const defaultDeps: CliDeps = {
  loadConfig,
  env: process.env,
  createStore: (config, secrets) =>
    new NukiLockClient({
      baseUrl: config.lock?.baseUrl ?? DEFAULTS.lockBaseUrl,
      token: secrets.lockApiToken,
      timeoutMs: lockTimeout(config)
    }),
  createSource: (config) =>
    new WorkbookBookingSource(
      workbookLoader(config),
      {
        arrival: config.columns?.arrival ?? DEFAULTS.arrivalColumn,
        departure: config.columns?.departure ?? DEFAULTS.departureColumn
      },
      config.headerScanRows ?? DEFAULTS.headerScanRows
    ),
  createSink: (config, secrets) => createReportSink(config, secrets.smtpPassword),
  createLogger: (config) =>
    createLogger({ timeZone: config.timeZone ?? DEFAULTS.timeZone, directory: config.logging?.directory }),
  now: () => new Date(),
  sleep: async (ms, signal) => {
    await sleepFor(ms, undefined, { signal });
  },
  prompt: promptLine,
  createAuthClient: createAuthCodeClient
};

function housekeepingFor(config: Config, logger: Logger, now: () => Date): () => void {
  const directory = config.logging?.directory;
  if (!directory) {
    return () => undefined;
  }
  return () => {
    pruneLogs({
      directory,
      retentionDays: config.logging?.retentionDays ?? DEFAULTS.logRetentionDays,
      timeZone: config.timeZone ?? DEFAULTS.timeZone,
      now: now(),
      logger
    });
  };
}

export async function runPass(ctx: RunContext): Promise<RunOutcome> {
  ctx.housekeeping();
  const startedAt = ctx.now();
  const today = calendarDateInZone(startedAt, ctx.settings.timeZone);
  ctx.logger.info(`Run started for ${ctx.units.length} unit(s), today is ${today}${ctx.settings.dryRun ? " (dry run)" : ""}`);

  const outcome = await runAll({
    units: ctx.units,
    source: ctx.source,
    store: ctx.store,
    settings: ctx.settings,
    today,
    logger: ctx.logger
  });

  const report = formatReport({
    outcome,
    runDate: startedAt,
    timeZone: ctx.settings.timeZone,
    subjectPrefix: ctx.config.report?.subjectPrefix ?? DEFAULTS.subjectPrefix
  });
  await deliverReport(ctx.sink, report, ctx.logger);
  return outcome;
}

export async function runDaemon(ctx: RunContext, deps: Pick<CliDeps, "sleep">, signal: AbortSignal): Promise<number> {
  const counters = new Store({ passes: 0, failedPasses: 0 });
  while (!signal.aborted) {
    const outcome = await runPass(ctx);
    counters.setState((state) => ({
      passes: state.passes + 1,
      failedPasses: state.failedPasses + (outcome.hadError ? 1 : 0)
    }));

    const now = ctx.now();
    const delay = sleepMsUntilNextRun(now, ctx.runTime, ctx.settings.timeZone);
    ctx.logger.info(`Next run at ${formatLocalDateTime(new Date(now.getTime() + delay), ctx.settings.timeZone)}`);
    try {
      await deps.sleep(delay, signal);
    } catch (error) {
      if (signal.aborted) {
        break;
      }
      throw error;
    }
  }
  const { passes, failedPasses } = counters.state;
  ctx.logger.info(`Stopped after ${passes} pass(es), ${failedPasses} with errors`);
  return passes;
}

function loadValidConfig(deps: CliDeps, path: string): Config | null {
  const config = deps.loadConfig(path);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`ERROR: ${error}`);
    }
    return null;
  }
  return config;
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command();
  program
    .name("stay-lock")
    .description("Keep each unit's guest keypad code in step with its booking spreadsheet")
    .option("--config <path>", "path to JSON config file", "./config/stay-lock.config.json")
    .option("--once", "run one pass and exit instead of waking daily", false)
    .option("--dry-run", "compute changes without writing to the lock", false)
    .exitOverride();

  program.action(async (options: { config: string; once: boolean; dryRun: boolean }) => {
    const config = loadValidConfig(deps, options.config);
    if (!config) {
      setExitCode(1);
      return;
    }

    let secrets: Secrets;
    try {
      secrets = loadSecrets(deps.env);
    } catch (error) {
      console.error(`ERROR: ${describeError(error)}`);
      setExitCode(1);
      return;
    }

    const logger = deps.createLogger(config);
    const ctx: RunContext = {
      config,
      settings: toSettings(config, { dryRun: options.dryRun }),
      units: toUnits(config),
      runTime: runTimeOf(config),
      store: deps.createStore(config, secrets),
      source: deps.createSource(config),
      sink: deps.createSink(config, secrets),
      logger,
      now: deps.now,
      housekeeping: housekeepingFor(config, logger, deps.now)
    };

    // A finished pass exits 0 even when units failed; failures go into the report.
    if (options.once) {
      await runPass(ctx);
      setExitCode(0);
      return;
    }

    const controller = new AbortController();
    const stop = (): void => controller.abort();
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
    try {
      await runDaemon(ctx, deps, controller.signal);
    } finally {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    }
    setExitCode(0);
  });

  program
    .command("validate-config")
    .description("check the config file and exit")
    .action(() => {
      const opts = program.opts<{ config: string }>();
      if (!loadValidConfig(deps, opts.config)) {
        setExitCode(1);
        return;
      }
      console.log("Config valid");
      setExitCode(0);
    });

  program
    .command("authorize-drive")
    .description("run the one-time Google consent flow and write the Drive token file")
    .option("--client-secret <path>", "OAuth client file (default: client_secret*.json next to the token file)")
    .option("--token <path>", "where to write the token file", "./config/token.json")
    .action(async (options: { clientSecret?: string; token: string }) => {
      try {
        const clientSecretPath = options.clientSecret ?? findClientSecretFile(dirname(options.token));
        if (!clientSecretPath) {
          throw new ConfigurationError(`No client_secret*.json found in ${dirname(options.token)}`);
        }
        await authorizeDrive({
          clientSecretPath,
          tokenPath: options.token,
          prompt: deps.prompt,
          createClient: deps.createAuthClient
        });
      } catch (error) {
        console.error(`ERROR: ${describeError(error)}`);
        setExitCode(1);
        return;
      }
      setExitCode(0);
    });

  return program;
}

export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

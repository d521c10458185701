#!/usr/bin/env tsx
import { config as loadEnv } from "dotenv";
import { runCli } from "./cli.js";

async function main(): Promise<void> {
  loadEnv({ path: process.env.STAY_LOCK_ENV_FILE ?? ".env" });
  process.exitCode = await runCli(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exit(1);
});

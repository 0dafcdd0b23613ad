#!/usr/bin/env node
import { Command } from "commander";
import { createApp } from "./app";
import { loadEnv, type AppEnv } from "./config/env";
import { parsePositiveInt } from "./config/runtime";
import { errorMessage } from "./utils/errors";
import { createLogger, setLogLevel } from "./utils/logger";

const log = createLogger("cli");

type CliOptions = {
  monitor: boolean;
  interval?: number;
  hours: number;
  recent?: number;
};

const program = new Command()
  .name("food-photo-sync")
  .description("Log food photos from Google Drive to Google Sheets with AI-drafted recipes")
  .option("--monitor", "Run in continuous monitoring mode", false)
  .option("--interval <minutes>", "Check interval in minutes (for monitor mode)", parsePositiveInt)
  .option("--hours <n>", "Check photos from the last N hours", parsePositiveInt, 24)
  .option("--recent <n>", "Print the last N logged entries and exit", parsePositiveInt);

async function main() {
  program.parse(process.argv);
  const opts = program.opts<CliOptions>();

  let env: AppEnv;
  try {
    env = loadEnv();
  } catch (e) {
    log.error(`Configuration error: ${errorMessage(e)}`);
    process.exit(1);
  }
  setLogLevel(env.LOG_LEVEL);

  const app = await createApp(env);

  if (opts.recent !== undefined) {
    const entries = await app.recentEntries(opts.recent);
    for (const entry of entries) {
      console.log(`${entry.date}\t${entry.foodName}\t${entry.photoUrl}`);
    }
    return;
  }

  if (!opts.monitor) {
    await app.runOnce(opts.hours);
    return;
  }

  const controller = new AbortController();
  const shutdown = () => {
    log.info("Shutting down food-photo-sync...");
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.runMonitor({
    intervalMinutes: opts.interval ?? env.CHECK_INTERVAL_MINUTES,
    hoursBack: opts.hours,
    signal: controller.signal,
  });
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    log.error("Fatal error", err);
    process.exit(1);
  });

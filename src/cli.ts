#!/usr/bin/env node
/**
 * Command-line entrypoint: runs one export immediately, then keeps running on
 * the configured cron schedule unless `--once` is given or scheduling is off.
 *
 *   personio-hr-export [--once]
 */
import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { getLogger, setLogLevel } from "./logger.js";
import { RunTracker } from "./orchestration/pipeline.js";
import { runTrackedExport, startExportSchedule } from "./orchestration/scheduled-export.js";

const logger = getLogger();

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: { once: { type: "boolean", default: false } },
  });

  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info("Starting Personio HR data export");

  const tracker = new RunTracker();
  const ok = await runTrackedExport(config, tracker, logger);

  if (values.once || !config.schedule.enabled) {
    if (!ok) process.exitCode = 1;
    return;
  }

  const schedule = startExportSchedule(config, tracker, logger);
  if (!schedule) return;

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Stopping scheduler");
    schedule.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, "Personio HR export failed to start");
  process.exitCode = 1;
});

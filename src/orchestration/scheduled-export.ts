/**
 * Tracked and scheduled export runs shared by the CLI and the MCP server, so
 * the health check sees every run the process makes.
 */

import type { Logger } from "pino";
import type { AppConfig } from "../config.js";
import { errorMessage, isFatalExportError } from "../errors.js";
import { generateRunId } from "../logger.js";
import { startSchedule, type ScheduleHandle } from "../scheduler.js";
import { runExport, type RunTracker } from "./pipeline.js";

/**
 * Run one export under `tracker`. Resolves false when the run failed or
 * another run was still active; never rejects.
 */
export async function runTrackedExport(
  config: AppConfig,
  tracker: RunTracker,
  logger: Logger
): Promise<boolean> {
  try {
    const runId = generateRunId();
    const result = await tracker.track(runId, () => runExport({ config, runId }));
    if (!result) logger.warn("An export run is already in progress");
    return result !== undefined;
  } catch (err) {
    // runExport has already logged the failure with its run context.
    if (!isFatalExportError(err)) {
      logger.error({ err: errorMessage(err) }, "Export run failed unexpectedly");
    }
    return false;
  }
}

/** Start the configured cron schedule, or return undefined when it is disabled. */
export function startExportSchedule(
  config: AppConfig,
  tracker: RunTracker,
  logger: Logger
): ScheduleHandle | undefined {
  if (!config.schedule.enabled) return undefined;
  return startSchedule({
    cron: config.schedule.cron,
    logger,
    job: () => runTrackedExport(config, tracker, logger),
  });
}

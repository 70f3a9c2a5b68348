#!/usr/bin/env node
/**
 * Personio HR export: MCP server entrypoint (stdio transport).
 * When scheduling is enabled, scheduled runs share the server's run tracker so
 * `ping` reports them.
 */
import "dotenv/config";
import { loadConfig } from "./config.js";
import { getLogger, setLogLevel } from "./logger.js";
import { RunTracker } from "./orchestration/pipeline.js";
import { startExportSchedule } from "./orchestration/scheduled-export.js";
import { createServer, createStdioTransport, SERVER_NAME } from "./server.js";

const logger = getLogger();

try {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const tracker = new RunTracker();
  const server = createServer(config, tracker);
  const transport = createStdioTransport();

  server
    .connect(transport)
    .then(() => {
      logger.info(`${SERVER_NAME}: running on stdio`);
      const schedule = startExportSchedule(config, tracker, logger);
      if (schedule) {
        server.server.onclose = () => schedule.stop();
      }
    })
    .catch((err: unknown) => {
      logger.fatal({ err }, `${SERVER_NAME}: failed to start`);
      process.exit(1);
    });
} catch (err) {
  logger.fatal({ err }, `${SERVER_NAME}: invalid configuration`);
  process.exit(1);
}

/**
 * Pino-based structured logger.
 *
 * Logs go to stderr: stdout belongs to the MCP stdio transport when the
 * server entrypoint is running.
 *
 * Environment variables:
 * - `LOG_LEVEL`: Minimum log level (default: "info")
 * - `NODE_ENV`: When "development", pretty-prints via pino-pretty
 */

import pino, { type Logger } from "pino";
import { randomUUID } from "node:crypto";

export type { Logger };

const SERVICE_NAME = "personio-hr-export";

function buildLogger(level: string): Logger {
  const options: pino.LoggerOptions = {
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: SERVICE_NAME },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  if (process.env.NODE_ENV === "development") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }
  return pino(options, pino.destination(2));
}

function initialLevel(): string {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  // Unknown levels are rejected later by config validation.
  return level && (level === "silent" || level in pino.levels.values) ? level : "info";
}

const rootLogger: Logger = buildLogger(initialLevel());

export function getLogger(): Logger {
  return rootLogger;
}

/** Re-level the root logger once configuration has been validated. */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

/** Child logger bound to one export run. */
export function createRunLogger(runId: string): Logger {
  return rootLogger.child({ runId });
}

export function generateRunId(): string {
  return randomUUID();
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * MCP server factory: creates server with stdio transport and tool registration.
 * Tools: `ping` (health check with last-run status) and `run_personio_export`.
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AppConfig } from "./config.js";
import { RunTracker } from "./orchestration/pipeline.js";
import {
  runPersonioExport,
  runPersonioExportShape,
} from "./tools/run-personio-export.js";

export const SERVER_NAME = "personio-hr-export";
export const SERVER_VERSION = "0.1.0";

export interface HealthPayload {
  status: "up";
  server: string;
  version: string;
  uptimeSeconds: number;
  timestamp: string;
  lastRun: ReturnType<RunTracker["snapshot"]>;
}

export function healthCheck(tracker: RunTracker, startedAt: number): HealthPayload {
  return {
    status: "up",
    server: SERVER_NAME,
    version: SERVER_VERSION,
    uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
    timestamp: new Date().toISOString(),
    lastRun: tracker.snapshot(),
  };
}

export function createServer(config: AppConfig, tracker = new RunTracker()): McpServer {
  const startedAt = Date.now();
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // -------------------------------------------------------------------------
  // ping: health check
  // -------------------------------------------------------------------------
  server.registerTool(
    "ping",
    {
      description: "Health check: server uptime and the status of the last export run",
      inputSchema: {},
    },
    async (): Promise<CallToolResult> => ({
      content: [
        {
          type: "text",
          text: JSON.stringify(healthCheck(tracker, startedAt)),
        },
      ],
    })
  );

  // ── Personio export ────────────────────────────────────────────────────────
  server.registerTool(
    "run_personio_export",
    {
      description:
        "Run a full Personio export: employee CSV, department summary CSV and, optionally, employee documents.",
      inputSchema: runPersonioExportShape,
    },
    (input) => runPersonioExport(input, config, tracker)
  );

  return server;
}

export function createStdioTransport(): StdioServerTransport {
  return new StdioServerTransport();
}

/**
 * run_personio_export MCP tool handler.
 *
 * Input:  includeDocuments (optional override of the configured default)
 * Output: the ExportResult of one full run, or an error payload.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { ExportError, errorMessage } from "../errors.js";
import { generateRunId } from "../logger.js";
import { runExport, type RunExportOptions, type RunTracker } from "../orchestration/pipeline.js";

// ---------------------------------------------------------------------------
// Input schema (shared between server registration and tests)
// ---------------------------------------------------------------------------

export const runPersonioExportShape = {
  includeDocuments: z
    .boolean()
    .optional()
    .describe("Download employee documents (defaults to EXPORT_INCLUDE_DOCUMENTS)"),
};

export type RunPersonioExportInput = {
  includeDocuments?: boolean;
};

// ---------------------------------------------------------------------------
// Tool handler
// ---------------------------------------------------------------------------

export async function runPersonioExport(
  input: RunPersonioExportInput,
  config: AppConfig,
  tracker: RunTracker,
  overrides: Omit<RunExportOptions, "config" | "includeDocuments" | "runId"> = {}
): Promise<CallToolResult> {
  const runId = generateRunId();

  try {
    const result = await tracker.track(runId, () =>
      runExport({ ...overrides, config, runId, includeDocuments: input.includeDocuments })
    );

    if (!result) {
      return errorResult("conflict", "An export run is already in progress");
    }

    return {
      content: [
        {
          type: "text",
          text: JSON.stringify({
            ...result,
            documents: result.documents && {
              succeeded: result.documents.succeeded,
              failed: result.documents.failed.map(({ ref, reason }) => ({
                employeeId: ref.employeeId,
                documentId: ref.documentId,
                filename: ref.filename,
                reason,
              })),
            },
          }),
        },
      ],
    };
  } catch (err) {
    return errorResult(err instanceof ExportError ? err.kind : "unexpected", errorMessage(err));
  }
}

function errorResult(kind: string, message: string): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: { kind, message } }) }],
    isError: true,
  };
}

/**
 * Export pipeline: one full extraction per run:
 * authenticate → extract → transform → write CSVs → download documents.
 *
 * Fatal errors (auth, API, file write) propagate to the caller after being
 * logged; no CSV is moved into place unless both files were written. Document
 * failures are collected in the FetchReport and never fail the run.
 */

import path from "node:path";
import type { Logger } from "pino";
import type { AppConfig } from "../config.js";
import { ExportError, errorMessage } from "../errors.js";
import { createRunLogger, generateRunId } from "../logger.js";
import { TokenProvider } from "../personio/auth.js";
import { PersonioGateway, type GatewayOptions } from "../personio/gateway.js";
import { PersonioExtractor, type ExtractorEndpoints } from "../personio/extractor.js";
import { DocumentFetcher, type FetchReport } from "../personio/documents.js";
import { EMPLOYEE_COLUMNS, EMPLOYEE_SCHEMA_VERSION, flattenAll } from "../personio/normalise.js";
import { writeCsvFiles } from "../export/csv.js";
import { SUMMARY_COLUMNS, summarize, toSummaryRows } from "../export/summary.js";
import type { ExportResult, RunStatus } from "./types.js";

export const EMPLOYEE_EXPORT_FILENAME = "personio_employee_export.csv";
export const DEPARTMENT_SUMMARY_FILENAME = "department_summary.csv";

export interface RunExportOptions {
  config: AppConfig;
  /** Overrides config.export.includeDocuments for this run. */
  includeDocuments?: boolean;
  runId?: string;
  logger?: Logger;
  endpoints?: Partial<ExtractorEndpoints>;
  /** Backoff hooks, mainly for tests. */
  http?: Pick<GatewayOptions, "sleep" | "random">;
}

export async function runExport(options: RunExportOptions): Promise<ExportResult> {
  const { config } = options;
  const runId = options.runId ?? generateRunId();
  const logger = options.logger ?? createRunLogger(runId);
  const includeDocuments = options.includeDocuments ?? config.export.includeDocuments;
  const outputPath = config.export.outputPath;
  const startedAt = new Date().toISOString();

  logger.info({ runId, outputPath, includeDocuments }, "Export run started");

  const tokens = new TokenProvider({
    clientId: config.personio.clientId,
    clientSecret: config.personio.clientSecret,
    baseUrl: config.personio.baseUrl,
    timeoutMs: config.http.timeoutMs,
    logger,
  });
  const gateway = new PersonioGateway({
    baseUrl: config.personio.baseUrl,
    tokens,
    timeoutMs: config.http.timeoutMs,
    retryMaxAttempts: config.http.retryMaxAttempts,
    pageSize: config.http.pageSize,
    logger,
    ...options.http,
  });

  try {
    // Authenticate up front so bad credentials fail before any data call.
    await tokens.getValidToken();

    const extractor = new PersonioExtractor(gateway, logger, options.endpoints);
    const { records, documents } = await extractor.extractAll({ includeDocuments });

    const { rows, skipped } = flattenAll(records, logger);
    logger.info({ rows: rows.length, skipped }, "Transformed employee records");

    const stats = summarize(rows);
    const employeeCsvPath = path.join(outputPath, EMPLOYEE_EXPORT_FILENAME);
    const summaryCsvPath = path.join(outputPath, DEPARTMENT_SUMMARY_FILENAME);
    await writeCsvFiles([
      { path: employeeCsvPath, columns: EMPLOYEE_COLUMNS, rows },
      { path: summaryCsvPath, columns: SUMMARY_COLUMNS, rows: toSummaryRows(stats) },
    ]);
    logger.info(
      { employeeCsvPath, summaryCsvPath, rows: rows.length, departments: stats.length },
      "CSV files written"
    );

    let documentReport: FetchReport | undefined;
    if (includeDocuments) {
      documentReport = await new DocumentFetcher(gateway, logger).fetchDocuments(
        documents,
        outputPath,
        true,
        { concurrency: config.documents.concurrency }
      );
    }

    const result: ExportResult = {
      runId,
      startedAt,
      completedAt: new Date().toISOString(),
      schemaVersion: EMPLOYEE_SCHEMA_VERSION,
      employeeCount: rows.length,
      skippedCount: skipped,
      departmentCount: stats.length,
      employeeCsvPath,
      summaryCsvPath,
      documents: documentReport,
    };
    logger.info(
      {
        employees: result.employeeCount,
        documentsSucceeded: documentReport?.succeeded,
        documentsFailed: documentReport?.failed.length,
      },
      "Export run finished"
    );
    return result;
  } catch (err) {
    logger.error(
      { kind: err instanceof ExportError ? err.kind : "unexpected", err: errorMessage(err) },
      "Export run failed"
    );
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Run status (reported by the health check)
// ---------------------------------------------------------------------------

/**
 * Tracks the latest run and refuses to start a second one while the first is
 * still in flight.
 */
export class RunTracker {
  private status: RunStatus = { state: "never" };

  isRunning(): boolean {
    return this.status.state === "running";
  }

  snapshot(): RunStatus {
    return { ...this.status };
  }

  /**
   * Run `job` and record its outcome. Returns undefined without calling `job`
   * when a run is already active. Errors are recorded and rethrown.
   */
  async track(runId: string, job: () => Promise<ExportResult>): Promise<ExportResult | undefined> {
    if (this.isRunning()) return undefined;

    const startedAt = new Date().toISOString();
    this.status = { state: "running", runId, startedAt };
    try {
      const result = await job();
      this.status = {
        state: "succeeded",
        runId,
        startedAt,
        completedAt: result.completedAt,
        employeeCount: result.employeeCount,
        documentFailures: result.documents?.failed.length ?? 0,
      };
      return result;
    } catch (err) {
      this.status = {
        state: "failed",
        runId,
        startedAt,
        completedAt: new Date().toISOString(),
        error: {
          kind: err instanceof ExportError ? err.kind : "unexpected",
          message: errorMessage(err),
        },
      };
      throw err;
    }
  }
}

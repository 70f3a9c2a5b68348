/**
 * Orchestration layer types: the result of one export run and the run
 * status reported by the health check.
 */

import type { FetchReport } from "../personio/documents.js";

export interface ExportResult {
  runId: string;
  startedAt: string;   // ISO 8601
  completedAt: string; // ISO 8601
  /** EMPLOYEE_SCHEMA_VERSION of the employee CSV written by this run. */
  schemaVersion: number;
  employeeCount: number;
  /** Records rejected by the Transformer (no employee id). */
  skippedCount: number;
  departmentCount: number;
  employeeCsvPath: string;
  summaryCsvPath: string;
  /** Undefined when documents were disabled for the run. */
  documents: FetchReport | undefined;
}

export type RunState =
  | "never"      // No run since process start
  | "running"
  | "succeeded"
  | "failed";

export interface RunStatus {
  state: RunState;
  runId?: string;
  startedAt?: string;
  completedAt?: string;
  employeeCount?: number;
  documentFailures?: number;
  /** Error kind and message if state === "failed". */
  error?: { kind: string; message: string };
}

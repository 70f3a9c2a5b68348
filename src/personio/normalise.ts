/**
 * Normalisation layer: flattens joined Personio records into the fixed
 * employee export schema.
 * Pure: no I/O. Missing optional data renders as "", never as a placeholder.
 */

import type { Logger } from "pino";
import { TransformationError } from "../errors.js";
import {
  asRecord,
  attributeValue,
  displayText,
  isRecord,
  scalarText,
  unwrapAttribute,
  type UnknownRecord,
} from "./records.js";
import type { RawCompensationRecord, RawEmployeeRecord } from "./types.js";

// ---------------------------------------------------------------------------
// Export schema (versioned: column names and order are part of the contract)
// ---------------------------------------------------------------------------

/** Bump when a column is added, removed, renamed or reordered. */
export const EMPLOYEE_SCHEMA_VERSION = 1;

export const EMPLOYEE_COLUMNS = [
  "employeeID",
  "First name",
  "Last name",
  "email",
  "status",
  "Hire date",
  "Termination date",
  "position",
  "department",
  "team",
  "Supervisor name",
  "location",
  "Weekly working hours",
  "Employment type",
  "Cost center",
  "Base Salary",
  "Last modified",
] as const;

export type EmployeeColumn = (typeof EMPLOYEE_COLUMNS)[number];

export type EmployeeRow = Record<EmployeeColumn, string>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Flatten one joined record. Throws TransformationError only when the record
 * has no employee id; every other gap becomes an empty cell.
 */
export function flatten(record: RawEmployeeRecord): EmployeeRow {
  if (!record.employeeId) {
    throw new TransformationError("Employee record has no employee id");
  }

  const master = asRecord(record.master);
  const employment = record.employment ?? {};
  const fromMaster = (key: string) => displayText(attributeValue(master, key));
  const fromEmployment = (key: string) => displayText(employment[key]) || fromMaster(key);

  return {
    employeeID: record.employeeId,
    "First name": fromMaster("first_name"),
    "Last name": fromMaster("last_name"),
    email: fromMaster("email"),
    status: fromMaster("status"),
    "Hire date": normaliseDate(attributeValue(master, "hire_date")),
    "Termination date": normaliseDate(attributeValue(master, "termination_date")),
    position: fromEmployment("position"),
    department: fromMaster("department"),
    team: fromMaster("team"),
    "Supervisor name": supervisorName(attributeValue(master, "supervisor")),
    location: fromMaster("office"),
    "Weekly working hours": formatHours(
      unwrapAttribute(employment.weekly_working_hours) ??
        attributeValue(master, "weekly_working_hours")
    ),
    "Employment type": fromEmployment("employment_type"),
    "Cost center": costCenters(
      employment.cost_centers ?? attributeValue(master, "cost_centers")
    ),
    "Base Salary": formatSalary(baseSalary(record.compensation)),
    "Last modified": normaliseDate(attributeValue(master, "last_modified_at")),
  };
}

export interface FlattenResult {
  rows: EmployeeRow[];
  skipped: number;
}

/**
 * Flatten a batch, skipping (and warning about) structurally unusable records.
 */
export function flattenAll(records: RawEmployeeRecord[], logger: Logger): FlattenResult {
  const rows: EmployeeRow[] = [];
  let skipped = 0;
  records.forEach((record, position) => {
    try {
      rows.push(flatten(record));
    } catch (err) {
      if (!(err instanceof TransformationError)) throw err;
      skipped += 1;
      logger.warn({ position, reason: err.message }, "Skipped employee record");
    }
  });
  return { rows, skipped };
}

/**
 * Normalise a date-like value to YYYY-MM-DD.
 * A leading ISO calendar date is kept verbatim (no timezone shift); other
 * parseable inputs use their UTC date; anything else is "".
 */
export function normaliseDate(raw: unknown): string {
  const value = unwrapAttribute(raw);
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value).toISOString().slice(0, 10) : "";
  }
  const text = scalarText(value);
  if (!text) return "";

  const iso = /^(\d{4}-\d{2}-\d{2})(?:$|[T\s])/.exec(text);
  if (iso) return iso[1];

  const parsed = Date.parse(text);
  return Number.isNaN(parsed) ? "" : new Date(parsed).toISOString().slice(0, 10);
}

/** Decimal string with two places, or "" when absent or unparsable. */
export function formatSalary(raw: unknown): string {
  const amount = parseAmount(raw);
  return amount === undefined ? "" : amount.toFixed(2);
}

export function parseAmount(raw: unknown): number | undefined {
  const value = unwrapAttribute(raw);
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  const text = scalarText(value);
  if (!text) return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function supervisorName(raw: unknown): string {
  const supervisor = unwrapAttribute(raw);
  if (!isRecord(supervisor)) return "";
  const part = (key: string) =>
    scalarText(unwrapAttribute(supervisor[key])) || scalarText(attributeValue(supervisor, key));
  return [part("first_name"), part("last_name")].filter(Boolean).join(" ");
}

function formatHours(raw: unknown): string {
  const hours = parseAmount(raw);
  return hours === undefined ? "" : String(hours);
}

function costCenters(raw: unknown): string {
  const value = unwrapAttribute(raw);
  if (Array.isArray(value)) {
    return value.map((entry) => displayText(entry)).filter(Boolean).join("; ");
  }
  return displayText(value);
}

const SALARY_TYPE = /base|fixed|salary/i;

/**
 * Pick the base salary amount: the latest-effective compensation whose type
 * looks like a fixed/base salary (or carries no type). Ties go to the later
 * record in server order.
 */
function baseSalary(compensations: RawCompensationRecord[]): unknown {
  let best: { effective: string; amount: unknown } | undefined;

  for (const raw of compensations) {
    const item: UnknownRecord = isRecord(raw.attributes) ? { ...raw, ...raw.attributes } : raw;
    const type = displayText(item.type);
    if (type && !SALARY_TYPE.test(type)) continue;

    const amount = compensationAmount(item);
    if (parseAmount(amount) === undefined) continue;

    const effective = normaliseDate(item.effective_from ?? item.effective_date);
    if (!best || effective >= best.effective) best = { effective, amount };
  }
  return best?.amount;
}

function compensationAmount(item: UnknownRecord): unknown {
  const amount = unwrapAttribute(item.amount);
  if (isRecord(amount)) return amount.value ?? amount.amount;
  return amount ?? item.value;
}

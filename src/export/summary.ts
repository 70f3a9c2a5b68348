/**
 * Department summary: recomputed from the full row set on every run.
 */

import { parseAmount, type EmployeeRow } from "../personio/normalise.js";
import type { CsvRow } from "./csv.js";

export const UNKNOWN_DEPARTMENT = "Unknown";

export const SUMMARY_COLUMNS = ["department", "employee_count", "average_base_salary"] as const;

export interface DepartmentStat {
  department: string;
  employeeCount: number;
  /** Undefined when no row in the bucket has a usable base salary. */
  averageBaseSalary: number | undefined;
}

/**
 * Bucket rows by department (whitespace-normalised, case-sensitive; blank →
 * "Unknown") and average the parseable base salaries. Output is sorted by
 * department name, so repeated calls on the same rows are identical.
 */
export function summarize(rows: readonly EmployeeRow[]): DepartmentStat[] {
  const buckets = new Map<string, { count: number; salaryTotal: number; salaried: number }>();

  for (const row of rows) {
    const department = departmentKey(row.department);
    const bucket = buckets.get(department) ?? { count: 0, salaryTotal: 0, salaried: 0 };
    bucket.count += 1;

    const salary = parseAmount(row["Base Salary"]);
    if (salary !== undefined) {
      bucket.salaryTotal += salary;
      bucket.salaried += 1;
    }
    buckets.set(department, bucket);
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([department, bucket]) => ({
      department,
      employeeCount: bucket.count,
      averageBaseSalary:
        bucket.salaried > 0 ? roundCents(bucket.salaryTotal / bucket.salaried) : undefined,
    }));
}

export function toSummaryRows(stats: readonly DepartmentStat[]): CsvRow[] {
  return stats.map((stat) => ({
    department: stat.department,
    employee_count: String(stat.employeeCount),
    average_base_salary:
      stat.averageBaseSalary === undefined ? "" : stat.averageBaseSalary.toFixed(2),
  }));
}

function departmentKey(raw: string | undefined): string {
  const normalised = (raw ?? "").replace(/\s+/g, " ").trim();
  return normalised || UNKNOWN_DEPARTMENT;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

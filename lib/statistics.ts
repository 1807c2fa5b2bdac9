// lib/statistics.ts
import { isDepartment } from "./config";
import type { Department } from "./config";
import type { EmployeeTotal, NormalizedRecord, Statistics } from "./types";

export const TOP_EMPLOYEE_COUNT = 3;

/**
 * Aggregate validated records in one pass.
 *
 * Employees are keyed by display name, so two ids sharing a name are merged.
 * Ranking is a stable descending sort over first-seen order, which makes ties
 * resolve to whoever appeared first in the input.
 */
export function computeStatistics(records: readonly NormalizedRecord[]): Statistics {
  let total_sales = 0;
  const deptTotal = new Map<Department, number>();
  const deptCount = new Map<Department, number>();
  const empTotal = new Map<string, number>();
  let minDate: string | null = null;
  let maxDate: string | null = null;

  for (const r of records) {
    total_sales += r.sales_amount;
    deptTotal.set(r.department, (deptTotal.get(r.department) ?? 0) + r.sales_amount);
    deptCount.set(r.department, (deptCount.get(r.department) ?? 0) + 1);
    empTotal.set(r.employee_name, (empTotal.get(r.employee_name) ?? 0) + r.sales_amount);
    // fixed-width zero-padded dates compare correctly as strings
    if (minDate === null || r.date < minDate) minDate = r.date;
    if (maxDate === null || r.date > maxDate) maxDate = r.date;
  }

  return {
    total_sales,
    avg_sale: records.length > 0 ? total_sales / records.length : 0,
    departments: Object.fromEntries(deptTotal),
    dept_counts: Object.fromEntries(deptCount),
    top_employees: rankEmployees(empTotal, TOP_EMPLOYEE_COUNT),
    date_range: minDate !== null && maxDate !== null ? { from: minDate, to: maxDate } : "N/A",
  };
}

export function rankEmployees(totals: ReadonlyMap<string, number>, limit: number): EmployeeTotal[] {
  return [...totals]
    .map(([name, total]) => ({ name, total }))
    .sort((a, b) => b.total - a.total)
    .slice(0, limit);
}

// Departments by total, highest first; ties keep insertion order
export function sortDepartments(departments: Statistics["departments"]): Array<[Department, number]> {
  const entries: Array<[Department, number]> = [];
  for (const [dept, total] of Object.entries(departments)) {
    if (total !== undefined && isDepartment(dept)) entries.push([dept, total]);
  }
  return entries.sort((a, b) => b[1] - a[1]);
}

/**
 * Flat-file writers: cleaned rows, department summary and the error log.
 * - toCleanedCsv(records) / exportCleaned(path, records)
 * - toDepartmentSummaryCsv(departments) / exportDepartmentSummary(path, departments)
 * - ErrorLog(path): reset() then append(error) per rejected row
 */
import { appendFileSync, writeFileSync } from "node:fs";
import { SALES_FIELDS } from "./config";
import { formatAmount } from "./normalize";
import { sortDepartments } from "./statistics";
import type { NormalizedRecord, Statistics, ValidationError } from "./types";

export const ERROR_LOG_BANNER = "=== Sales Data Validation Errors ===";

type Cell = string | number;

export function csvCell(cell: Cell): string {
  const s = String(cell);
  return /[",\r\n]/.test(s) ? '"' + s.replace(/"/g, '""') + '"' : s;
}

function toCsv(headers: readonly string[], rows: Cell[][]): string {
  return [headers.join(","), ...rows.map(r => r.map(csvCell).join(","))].join("\n") + "\n";
}

export function toCleanedCsv(records: readonly NormalizedRecord[]): string {
  return toCsv(
    SALES_FIELDS,
    records.map(r => [r.employee_id, r.employee_name, r.department, formatAmount(r.sales_amount), r.date]),
  );
}

export function toDepartmentSummaryCsv(departments: Statistics["departments"]): string {
  return toCsv(
    ["department", "total_sales"],
    sortDepartments(departments).map(([dept, total]) => [dept, formatAmount(total)]),
  );
}

// Returns false when there was nothing to write
export function exportCleaned(path: string, records: readonly NormalizedRecord[]): boolean {
  if (records.length === 0) return false;
  writeFileSync(path, toCleanedCsv(records), "utf8");
  return true;
}

export function exportDepartmentSummary(path: string, departments: Statistics["departments"]): void {
  writeFileSync(path, toDepartmentSummaryCsv(departments), "utf8");
}

export function formatErrorLine(error: ValidationError): string {
  return `Line ${error.line}: ${error.reason} → ${JSON.stringify(error.raw)}`;
}

export class ErrorLog {
  constructor(readonly path: string) {}

  reset(): void {
    writeFileSync(this.path, `${ERROR_LOG_BANNER}\n\n`, "utf8");
  }

  append(error: ValidationError): void {
    appendFileSync(this.path, formatErrorLine(error) + "\n", "utf8");
  }
}

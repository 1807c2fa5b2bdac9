// lib/validate-row.ts
import { DATE_FORMAT, VALID_DEPARTMENTS, isDepartment } from "./config";
import type { SalesField } from "./config";
import { describeError } from "./errors";
import { cleanText, parseAmount, toISODate, toPositiveIntegerString, toTitleCase } from "./normalize";
import type { NormalizedRecord, RawRecord, ValidationResult } from "./types";

export const REASONS = {
  employeeId: "employee_id must be a positive integer",
  employeeName: "employee_name cannot be empty",
  department: `department must be one of: ${VALID_DEPARTMENTS.join(", ")}`,
  salesAmount: "sales_amount must be a positive number",
  date: `date must be in ${DATE_FORMAT} format`,
} as const;

type Trimmed = Record<SalesField, string>;

// Each step either narrows the value or names the reason; the first failure wins.
type Step<T> = { value: T } | { reason: string };

function step<T>(value: T | null, reason: string): Step<T> {
  return value === null ? { reason } : { value };
}

function trimAll(raw: RawRecord): Trimmed {
  return {
    employee_id: cleanText(raw.employee_id),
    employee_name: cleanText(raw.employee_name),
    department: cleanText(raw.department),
    sales_amount: cleanText(raw.sales_amount),
    date: cleanText(raw.date),
  };
}

function normalize(t: Trimmed): Step<NormalizedRecord> {
  const id = step(toPositiveIntegerString(t.employee_id), REASONS.employeeId);
  if ("reason" in id) return id;

  const name = step(t.employee_name || null, REASONS.employeeName);
  if ("reason" in name) return name;

  const titled = toTitleCase(t.department);
  const dept = step(isDepartment(titled) ? titled : null, REASONS.department);
  if ("reason" in dept) return dept;

  const parsed = parseAmount(t.sales_amount);
  const amount = step(parsed !== null && parsed > 0 ? parsed : null, REASONS.salesAmount);
  if ("reason" in amount) return amount;

  const date = step(toISODate(t.date), REASONS.date);
  if ("reason" in date) return date;

  return {
    value: {
      employee_id: id.value,
      employee_name: name.value,
      department: dept.value,
      sales_amount: amount.value,
      date: date.value,
    },
  };
}

/**
 * Validate and normalize one input row. Never throws: anything unexpected is
 * reported as a row-level error carrying the original record.
 */
export function validateRow(raw: RawRecord, line: number): ValidationResult {
  try {
    const result = normalize(trimAll(raw));
    if ("reason" in result) return { ok: false, error: { line, reason: result.reason, raw } };
    return { ok: true, record: result.value };
  } catch (e) {
    return { ok: false, error: { line, reason: `unexpected error: ${describeError(e)}`, raw } };
  }
}

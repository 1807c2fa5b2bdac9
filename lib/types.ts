import type { Department, SalesField } from "./config";

export type ISODate = string;              // "YYYY-MM-DD"

// As read from the file: every field a string, any of them possibly missing
export type RawRecord = Partial<Record<SalesField, string | null>>;

export type NormalizedRecord = {
  employee_id: string;              // canonical decimal, no leading zeros
  employee_name: string;            // trimmed, non-empty
  department: Department;
  sales_amount: number;             // > 0
  date: ISODate;
};

export type ValidationError = {
  line: number;                     // 1-based, header is line 1
  reason: string;
  raw: RawRecord;
};

export type ValidationResult =
  | { ok: true; record: NormalizedRecord }
  | { ok: false; error: ValidationError };

export type EmployeeTotal = {
  name: string;
  total: number;
};

export type DateRange = { from: ISODate; to: ISODate } | "N/A";

export type Statistics = {
  total_sales: number;
  avg_sale: number;
  departments: Partial<Record<Department, number>>;
  dept_counts: Partial<Record<Department, number>>;
  top_employees: EmployeeTotal[];   // at most 3, descending
  date_range: DateRange;
};

export type ParsedSheet = {
  headers: string[];
  rows: RawRecord[];
};

export type RecordCounts = {
  total: number;
  valid: number;
  invalid: number;
};

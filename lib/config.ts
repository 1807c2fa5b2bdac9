// lib/config.ts
import type { LogLevel } from "./logger";

export const SALES_FIELDS = ["employee_id", "employee_name", "department", "sales_amount", "date"] as const;
export type SalesField = (typeof SALES_FIELDS)[number];

export const VALID_DEPARTMENTS = ["Electronics", "Clothing", "Home", "Sports"] as const;
export type Department = (typeof VALID_DEPARTMENTS)[number];

export const DATE_FORMAT = "YYYY-MM-DD";

export const DEFAULT_OUTPUTS = {
  cleaned: "cleaned_data.csv",
  summary: "department_summary.csv",
  errors: "errors.txt",
} as const;

export type OutputPaths = {
  cleaned: string;
  summary: string;
  errors: string;
};

export type RunConfig = {
  outputs: OutputPaths;
  logLevel: LogLevel;
};

export type ConfigOverrides = Partial<OutputPaths> & { logLevel?: LogLevel };

export function isDepartment(s: string): s is Department {
  return (VALID_DEPARTMENTS as readonly string[]).includes(s);
}

/**
 * Command-line options win over the defaults. Blank strings count as unset so
 * an empty `--errors ""` does not turn into a write to the working directory.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): RunConfig {
  const pick = (v: string | undefined, fallback: string) => (v && v.trim() ? v.trim() : fallback);
  return {
    outputs: {
      cleaned: pick(overrides.cleaned, DEFAULT_OUTPUTS.cleaned),
      summary: pick(overrides.summary, DEFAULT_OUTPUTS.summary),
      errors: pick(overrides.errors, DEFAULT_OUTPUTS.errors),
    },
    logLevel: overrides.logLevel ?? "info",
  };
}

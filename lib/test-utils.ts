// Shared fixtures for the *.test.ts files
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SALES_FIELDS } from "./config";
import type { Department } from "./config";
import { Logger } from "./logger";
import type { NormalizedRecord } from "./types";

export const HEADER = SALES_FIELDS.join(",");

export function createRecord(
  employee_name: string,
  department: Department,
  sales_amount: number,
  date = "2024-01-01",
  employee_id = "1",
): NormalizedRecord {
  return { employee_id, employee_name, department, sales_amount, date };
}

export function createCapturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger("debug", line => lines.push(line)), lines };
}

export type TempDir = {
  path: string;
  file(name: string, contents?: string): string;
  cleanup(): void;
};

// Fresh directory per test; `file` returns an absolute path, writing it when contents are given
export function createTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), "sales-report-"));
  return {
    path,
    file(name, contents) {
      const p = join(path, name);
      if (contents !== undefined) writeFileSync(p, contents, "utf8");
      return p;
    },
    cleanup() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

import { existsSync, readFileSync } from "node:fs";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  ERROR_LOG_BANNER,
  ErrorLog,
  csvCell,
  exportCleaned,
  exportDepartmentSummary,
  formatErrorLine,
  toCleanedCsv,
  toDepartmentSummaryCsv,
} from "./exporters";
import { createRecord, createTempDir } from "./test-utils";
import type { TempDir } from "./test-utils";

describe("csvCell", () => {
  it("quotes only when needed", () => {
    expect(csvCell("Ana")).toBe("Ana");
    expect(csvCell(12.5)).toBe("12.5");
    expect(csvCell("Lee, Jr.")).toBe('"Lee, Jr."');
    expect(csvCell('say "hi"')).toBe('"say ""hi"""');
    expect(csvCell("two\nlines")).toBe('"two\nlines"');
  });
});

describe("toCleanedCsv", () => {
  it("writes the header and two-decimal amounts in input order", () => {
    const csv = toCleanedCsv([
      createRecord("Ana", "Home", 1234.5, "2024-01-05", "7"),
      createRecord("Lee, Jr.", "Sports", 3, "2024-01-06", "8"),
    ]);
    expect(csv).toBe(
      "employee_id,employee_name,department,sales_amount,date\n" +
        "7,Ana,Home,1234.50,2024-01-05\n" +
        '8,"Lee, Jr.",Sports,3.00,2024-01-06\n',
    );
  });
});

describe("toDepartmentSummaryCsv", () => {
  it("sorts departments by total descending", () => {
    expect(toDepartmentSummaryCsv({ Clothing: 50, Electronics: 300, Home: 120.25 })).toBe(
      "department,total_sales\nElectronics,300.00\nHome,120.25\nClothing,50.00\n",
    );
  });

  it("writes just the header when there are no departments", () => {
    expect(toDepartmentSummaryCsv({})).toBe("department,total_sales\n");
  });
});

describe("formatErrorLine", () => {
  it("names the line, the reason and the original row", () => {
    expect(
      formatErrorLine({ line: 3, reason: "employee_id must be a positive integer", raw: { employee_id: "0", employee_name: "Ana" } }),
    ).toBe('Line 3: employee_id must be a positive integer → {"employee_id":"0","employee_name":"Ana"}');
  });
});

describe("file writers", () => {
  let dir: TempDir;
  beforeEach(() => { dir = createTempDir(); });
  afterEach(() => dir.cleanup());

  it("resets then appends to the error log", () => {
    const log = new ErrorLog(dir.file("errors.txt", "stale content\n"));
    log.reset();
    log.append({ line: 2, reason: "employee_name cannot be empty", raw: { employee_name: "" } });
    log.append({ line: 4, reason: "date must be in YYYY-MM-DD format", raw: { date: "2024-13-01" } });

    expect(readFileSync(log.path, "utf8")).toBe(
      `${ERROR_LOG_BANNER}\n\n` +
        'Line 2: employee_name cannot be empty → {"employee_name":""}\n' +
        'Line 4: date must be in YYYY-MM-DD format → {"date":"2024-13-01"}\n',
    );
  });

  it("skips the cleaned file when there are no records", () => {
    const path = dir.file("cleaned.csv");
    expect(exportCleaned(path, [])).toBe(false);
    expect(existsSync(path)).toBe(false);
  });

  it("writes the cleaned and summary files", () => {
    const cleaned = dir.file("cleaned.csv");
    const summary = dir.file("summary.csv");
    expect(exportCleaned(cleaned, [createRecord("Ana", "Home", 2)])).toBe(true);
    exportDepartmentSummary(summary, { Home: 2 });

    expect(readFileSync(cleaned, "utf8")).toBe("employee_id,employee_name,department,sales_amount,date\n1,Ana,Home,2.00,2024-01-01\n");
    expect(readFileSync(summary, "utf8")).toBe("department,total_sales\nHome,2.00\n");
  });
});

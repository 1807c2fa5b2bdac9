// lib/report.ts
import { sortDepartments } from "./statistics";
import type { RecordCounts, Statistics } from "./types";

export const RULE = "=".repeat(40);

const money = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });

// 1234.5 -> "$1,234.50"
export function formatCurrency(n: number): string {
  return `$${money.format(n)}`;
}

export function formatReport(stats: Statistics, counts: RecordCounts): string {
  const lines = [
    RULE,
    "SALES ANALYSIS REPORT",
    RULE,
    `Total Records Processed: ${counts.total}`,
    `Valid Records: ${counts.valid}`,
    `Invalid Records: ${counts.invalid}`,
    "",
    "OVERALL STATISTICS:",
    `Total Sales:     ${formatCurrency(stats.total_sales)}`,
    `Average Sale:    ${formatCurrency(stats.avg_sale)}`,
    "",
    "SALES BY DEPARTMENT:",
  ];

  for (const [dept, total] of sortDepartments(stats.departments)) {
    const count = stats.dept_counts[dept] ?? 0;
    const avg = count > 0 ? total / count : 0;
    lines.push(`${dept.padEnd(12)} ${formatCurrency(total)}  (${count} sales, avg ${formatCurrency(avg)})`);
  }

  lines.push("", "TOP 3 EMPLOYEES:");
  stats.top_employees.forEach((e, i) => {
    lines.push(`${i + 1}. ${e.name.padEnd(15)} ${formatCurrency(e.total)}`);
  });

  const range = stats.date_range === "N/A" ? "N/A" : `${stats.date_range.from} to ${stats.date_range.to}`;
  lines.push("", `Date Range: ${range}`, RULE);
  return lines.join("\n");
}

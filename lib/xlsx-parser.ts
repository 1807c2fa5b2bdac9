import * as XLSX from "xlsx";
import { toRawRecord } from "./csv-parser";
import type { ParsedSheet } from "./types";

// First sheet only; cells come back as their formatted text, like a CSV export would give
export function parseSalesXlsx(buf: Buffer): ParsedSheet {
  const workbook = XLSX.read(buf, { type: "buffer", dateNF: "yyyy-mm-dd" });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return { headers: [], rows: [] };

  const [headerRow] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false });
  const headers = (headerRow ?? []).map(h => String(h ?? ""));
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: "", raw: false, blankrows: false, dateNF: "yyyy-mm-dd" });
  return { headers, rows: rows.map(toRawRecord) };
}

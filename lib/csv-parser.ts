import { parse } from "csv-parse/sync";
import { SALES_FIELDS } from "./config";
import type { ParsedSheet, RawRecord } from "./types";

// Throws on bytes that are not UTF-8 instead of substituting U+FFFD
const utf8 = new TextDecoder("utf-8", { fatal: true });

function detectDelimiter(text: string): string {
  return text.slice(0, 4096).split("\n")[0].includes(";") ? ";" : ",";
}

// Pick the known fields out of a parsed row; anything else is ignored
export function toRawRecord(row: unknown): RawRecord {
  const out: RawRecord = {};
  if (typeof row !== "object" || row === null) return out;
  const cells = new Map<string, unknown>(Object.entries(row));
  for (const field of SALES_FIELDS) {
    const v = cells.get(field);
    if (v !== undefined && v !== null) out[field] = String(v);
  }
  return out;
}

export function headersMatch(headers: readonly string[]): boolean {
  return headers.length === SALES_FIELDS.length && SALES_FIELDS.every((f, i) => headers[i] === f);
}

/**
 * Parse a sales CSV whose first line is the header row. Short rows are kept
 * (missing fields come through as absent) and a stray quote inside an
 * unquoted field stays part of the value, so that the validator, not the
 * parser, decides what is wrong with them.
 */
export function parseSalesCsv(buffer: Buffer): ParsedSheet {
  const text = utf8.decode(buffer);
  let headers: string[] = [];
  const parsed: unknown = parse(text, {
    bom: true,
    delimiter: detectDelimiter(text),
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
    columns: (header: string[]) => {
      headers = [...header];
      return headers;
    },
  });
  const rows = Array.isArray(parsed) ? parsed.map(toRawRecord) : [];
  return { headers, rows };
}

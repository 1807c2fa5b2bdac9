// lib/load.ts
import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { headersMatch, parseSalesCsv } from "./csv-parser";
import { toLoadError } from "./errors";
import type { LoadError } from "./errors";
import type { ErrorLog } from "./exporters";
import type { Logger } from "./logger";
import type { NormalizedRecord, ParsedSheet } from "./types";
import { validateRow } from "./validate-row";
import { parseSalesXlsx } from "./xlsx-parser";

// Row 1 is the header, so the first data row is line 2
export const FIRST_DATA_LINE = 2;

export type LoadResult =
  | {
      ok: true;
      valid: NormalizedRecord[];
      invalidCount: number;
      total: number;
      headersMatch: boolean;
    }
  | { ok: false; error: LoadError };

export function readSheet(path: string): ParsedSheet {
  const buf = readFileSync(path);
  const ext = extname(path).toLowerCase();
  return ext === ".xlsx" || ext === ".xls" ? parseSalesXlsx(buf) : parseSalesCsv(buf);
}

/**
 * Read `path`, validate every row and log the rejects. File-level failures
 * come back as `{ ok: false }` with nothing processed; row-level failures
 * only bump `invalidCount`.
 */
export function loadAndValidate(path: string, errorLog: ErrorLog, logger: Logger): LoadResult {
  errorLog.reset();

  let sheet: ParsedSheet;
  try {
    sheet = readSheet(path);
  } catch (e) {
    const error = toLoadError(e, path);
    logger.error(error.message);
    return { ok: false, error };
  }

  const matches = headersMatch(sheet.headers);
  if (!matches) logger.warn("CSV headers do not exactly match expected format.");

  const valid: NormalizedRecord[] = [];
  let invalidCount = 0;
  sheet.rows.forEach((raw, i) => {
    const result = validateRow(raw, i + FIRST_DATA_LINE);
    if (result.ok) {
      valid.push(result.record);
    } else {
      invalidCount++;
      errorLog.append(result.error);
      logger.debug(`line ${result.error.line} rejected: ${result.error.reason}`);
    }
  });

  return { ok: true, valid, invalidCount, total: sheet.rows.length, headersMatch: matches };
}

// lib/pipeline.ts
import type { RunConfig } from "./config";
import { ErrorLog, exportCleaned, exportDepartmentSummary } from "./exporters";
import { loadAndValidate } from "./load";
import type { Logger } from "./logger";
import { formatReport } from "./report";
import { computeStatistics } from "./statistics";
import type { RecordCounts, Statistics } from "./types";

export type Print = (text: string) => void;

export type RunOutcome =
  | { status: "failed"; exitCode: 1; message: string }
  | { status: "empty"; exitCode: 0 }
  | { status: "done"; exitCode: 0; counts: RecordCounts; stats: Statistics; written: string[] };

/**
 * Load -> validate -> aggregate -> report -> export. A file that cannot be
 * read fails the run; a file with no data rows ends it early without error.
 */
export function runPipeline(input: string, config: RunConfig, logger: Logger, print: Print): RunOutcome {
  const { outputs } = config;
  logger.info(`Loading data from ${input}`);

  const loaded = loadAndValidate(input, new ErrorLog(outputs.errors), logger);
  if (!loaded.ok) {
    return { status: "failed", exitCode: 1, message: loaded.error.message };
  }
  if (loaded.total === 0) {
    print("No records were processed. Check file and try again.");
    return { status: "empty", exitCode: 0 };
  }

  const counts: RecordCounts = {
    total: loaded.total,
    valid: loaded.valid.length,
    invalid: loaded.invalidCount,
  };
  logger.info(`Valid records: ${counts.valid}`);
  logger.info(`Invalid records: ${counts.invalid} (details in ${outputs.errors})`);

  const stats = computeStatistics(loaded.valid);
  print(formatReport(stats, counts));

  const written: string[] = [];
  if (exportCleaned(outputs.cleaned, loaded.valid)) {
    written.push(outputs.cleaned);
    logger.info(`Cleaned data -> ${outputs.cleaned}`);
  } else {
    logger.warn(`No valid records; ${outputs.cleaned} not written`);
  }
  exportDepartmentSummary(outputs.summary, stats.departments);
  written.push(outputs.summary);
  logger.info(`Department summary -> ${outputs.summary}`);
  logger.info(`Errors logged to -> ${outputs.errors}`);

  return { status: "done", exitCode: 0, counts, stats, written };
}

// lib/program.ts
import { createInterface } from "node:readline/promises";
import { Command, InvalidArgumentError } from "commander";
import { resolveConfig, DEFAULT_OUTPUTS } from "./config";
import { isLogLevel, LOG_LEVELS, Logger } from "./logger";
import type { LogLevel } from "./logger";
import { RULE } from "./report";
import { runPipeline } from "./pipeline";

type CliOptions = {
  cleaned?: string;
  summary?: string;
  errors?: string;
  logLevel?: LogLevel;
};

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) throw new InvalidArgumentError(`expected one of ${LOG_LEVELS.join(", ")}`);
  return value;
}

// Input closed before an answer (EOF, Ctrl-D) counts as an empty answer
async function promptForFile(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  const onClose = new Promise<string>(resolve => {
    rl.once("close", () => {
      closed = true;
      resolve("");
    });
  });
  const answer = rl.question("Enter CSV filename: ").catch((e: unknown) => {
    if (closed) return "";
    throw e;
  });
  try {
    return (await Promise.race([answer, onClose])).trim();
  } finally {
    rl.close();
  }
}

export function buildProgram(): Command {
  return new Command()
    .name("sales-report")
    .description("Validate a sales CSV, print a summary report and write cleaned outputs")
    .argument("[file]", "input .csv or .xlsx file (prompted for when omitted)")
    .option("--cleaned <path>", "cleaned data output", DEFAULT_OUTPUTS.cleaned)
    .option("--summary <path>", "department summary output", DEFAULT_OUTPUTS.summary)
    .option("--errors <path>", "validation error log", DEFAULT_OUTPUTS.errors)
    .option("--log-level <level>", `one of ${LOG_LEVELS.join(", ")}`, parseLogLevel, "info")
    .action(async (file: string | undefined, options: CliOptions) => {
      const config = resolveConfig(options);
      const logger = new Logger(config.logLevel);
      const print = (text: string) => console.log(text);

      print(RULE);
      print("SALES DATA PROCESSING TOOL");
      print(RULE);

      const input = file?.trim() || (await promptForFile());
      if (!input) {
        print("No filename entered. Exiting.");
        return;
      }

      const outcome = runPipeline(input, config, logger, print);
      if (outcome.status === "done") print("Processing complete!");
      process.exitCode = outcome.exitCode;
    });
}

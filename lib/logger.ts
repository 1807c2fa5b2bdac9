// lib/logger.ts
// Leveled status logger. Report output goes to stdout; these lines go to stderr.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_VALUES: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO ",
  warn: "WARN ",
  error: "ERROR",
};

export type LogSink = (line: string) => void;

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export class Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly sink: LogSink = (line) => console.error(line),
  ) {}

  debug(message: string) { this.write("debug", message); }
  info(message: string) { this.write("info", message); }
  warn(message: string) { this.write("warn", message); }
  error(message: string) { this.write("error", message); }

  private write(level: LogLevel, message: string) {
    if (LEVEL_VALUES[level] < LEVEL_VALUES[this.level]) return;
    this.sink(`[${LEVEL_LABELS[level]}] ${message}`);
  }
}

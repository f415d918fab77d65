// Diagnostics for bgjob: prefixed lines on stderr, errors mirrored to an error log

import { appendFileSync } from "fs";
import { chalkStderr } from "chalk";
import { errorMessage } from "./errors.ts";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  /** `step` names what was being attempted, e.g. "log write". */
  error(step: string, err: unknown): void;
}

export interface LoggerOptions {
  // When set, errors are also appended here
  errorLogPath?: string;
  // Suppress info lines (warnings and errors still print)
  quiet?: boolean;
  write?: (line: string) => void;
}

export function formatErrorLine(step: string, err: unknown, now: Date = new Date()): string {
  return `${now.toISOString()} Error during ${step}: ${errorMessage(err)}\n`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(line));

  return {
    info(message) {
      if (options.quiet) return;
      write(`${chalkStderr.green("[bgjob]")} ${message}\n`);
    },
    warn(message) {
      write(`${chalkStderr.yellow("[warn]")} ${message}\n`);
    },
    error(step, err) {
      write(`${chalkStderr.red("[error]")} ${step}: ${errorMessage(err)}\n`);
      if (!options.errorLogPath) return;
      try {
        appendFileSync(options.errorLogPath, formatErrorLine(step, err));
      } catch (logErr) {
        write(`${chalkStderr.red("[error]")} error log: ${errorMessage(logErr)}\n`);
      }
    },
  };
}

/** Logger that keeps entries in memory; used by tests and embedders. */
export interface RecordedEntry {
  level: "info" | "warn" | "error";
  message: string;
}

export function createMemoryLogger(): Logger & { entries: RecordedEntry[] } {
  const entries: RecordedEntry[] = [];
  return {
    entries,
    info(message) {
      entries.push({ level: "info", message });
    },
    warn(message) {
      entries.push({ level: "warn", message });
    },
    error(step, err) {
      entries.push({ level: "error", message: `${step}: ${errorMessage(err)}` });
    },
  };
}

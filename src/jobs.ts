// Job model shared by the store, runner and reporter

export type JobState = "running" | "succeeded" | "failed" | "unknown";

/**
 * Exit code recorded when the shell itself could not be started
 * (missing executable, permission denied, bad working directory).
 */
export const SPAWN_FAILED_EXIT_CODE = -1;

/**
 * Exit code recorded when the process ended without one, e.g. it was
 * killed by a signal. Real exit codes are 0-255, so neither sentinel
 * collides with them.
 */
export const ABNORMAL_EXIT_CODE = -2;

export interface Job {
  id: string;
  name: string;
  command: string;
  createdAt: string;
  dir: string;
  namePath: string;
  commandPath: string;
  logPath: string;
  statusPath: string;
  pidPath: string;
}

export interface JobStatus {
  state: JobState;
  exitCode?: number;
}

export type JobRecord = Job & JobStatus;

export interface JobPids {
  runner: number;
  child: number | null;
}

export interface JobOutcome {
  jobId: string;
  exitCode: number;
  state: Exclude<JobState, "running" | "unknown">;
  signal: NodeJS.Signals | null;
  error: string | null;
}

export function stateForExitCode(exitCode: number): "succeeded" | "failed" {
  return exitCode === 0 ? "succeeded" : "failed";
}

export function formatStatus(exitCode: number): string {
  return `exit ${exitCode}\n`;
}

const STATUS_PATTERN = /^exit (-?\d+)$/;

/** Parse status file content; null when it is truncated or malformed. */
export function parseStatus(content: string): number | null {
  const match = STATUS_PATTERN.exec(content.trim());
  if (!match) return null;
  const code = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(code) ? code : null;
}

let sequence = 0;

/**
 * `<epoch-ms>-<pid>-<seq>`. The counter keeps ids distinct inside one
 * process even within the same millisecond; the pid separates processes.
 */
export function generateJobId(now: number = Date.now(), pid: number = process.pid): string {
  sequence += 1;
  return `${now}-${pid}-${sequence}`;
}

interface IdParts {
  timestamp: number;
  pid: number;
  seq: number;
}

export function parseJobId(id: string): IdParts | null {
  const match = /^(\d+)-(\d+)-(\d+)$/.exec(id);
  if (!match) return null;
  return {
    timestamp: Number(match[1]),
    pid: Number(match[2]),
    seq: Number(match[3]),
  };
}

/** Submission order: timestamp, then pid, then counter. Foreign names sort last. */
export function compareJobIds(a: string, b: string): number {
  const pa = parseJobId(a);
  const pb = parseJobId(b);
  if (pa && pb) {
    return pa.timestamp - pb.timestamp || pa.pid - pb.pid || pa.seq - pb.seq;
  }
  if (pa) return -1;
  if (pb) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

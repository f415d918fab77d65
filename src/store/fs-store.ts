// Directory-per-job JobStore implementation.
//
//   <root>/jobs/<id>/name.txt      label
//   <root>/jobs/<id>/command.txt   command line
//   <root>/jobs/<id>/log.txt       combined stdout+stderr
//   <root>/jobs/<id>/status.txt    "exit <code>", written once
//   <root>/jobs/<id>/pid.json      runner and child pids

import { existsSync, mkdirSync, readFileSync, statSync } from "fs";
import { join } from "path";
import { globSync } from "glob";
import { JOBS_DIRNAME } from "../environment.ts";
import { errorCode } from "../errors.ts";
import { atomicCreateFileSync, atomicWriteFileSync, ensureDirSync } from "../fs-utils.ts";
import {
  compareJobIds,
  formatStatus,
  generateJobId,
  parseJobId,
  parseStatus,
  stateForExitCode,
  type Job,
  type JobPids,
  type JobRecord,
  type JobStatus,
} from "../jobs.ts";
import type { JobRef, JobStore } from "./job-store.ts";

const MAX_ALLOCATE_ATTEMPTS = 100;

/**
 * Check if a process with the given PID is still running.
 * EPERM means it exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errorCode(err) === "EPERM";
  }
}

function readText(path: string): string | null {
  try {
    return readFileSync(path, "utf-8");
  } catch {
    return null;
  }
}

// Ids are single path segments
function isJobIdSegment(jobId: string): boolean {
  return jobId.length > 0 && !jobId.includes("/") && jobId !== "." && jobId !== "..";
}

function parsePids(content: string): JobPids | null {
  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof value !== "object" || value === null) return null;
  const runner = "runner" in value ? value.runner : undefined;
  const child = "child" in value ? value.child : undefined;
  if (typeof runner !== "number") return null;
  return { runner, child: typeof child === "number" ? child : null };
}

export class FsJobStore implements JobStore {
  readonly root: string;
  readonly jobsDir: string;

  constructor(root: string) {
    this.root = root;
    this.jobsDir = join(root, JOBS_DIRNAME);
    ensureDirSync(this.jobsDir);
  }

  private paths(jobId: string): Omit<Job, "name" | "command" | "createdAt"> {
    const dir = join(this.jobsDir, jobId);
    return {
      id: jobId,
      dir,
      namePath: join(dir, "name.txt"),
      commandPath: join(dir, "command.txt"),
      logPath: join(dir, "log.txt"),
      statusPath: join(dir, "status.txt"),
      pidPath: join(dir, "pid.json"),
    };
  }

  private resolve(job: JobRef): Omit<Job, "name" | "command" | "createdAt"> | null {
    if (typeof job !== "string") return job;
    return isJobIdSegment(job) ? this.paths(job) : null;
  }

  private createdAt(jobId: string, dir: string): string {
    const parts = parseJobId(jobId);
    if (parts) return new Date(parts.timestamp).toISOString();
    try {
      return statSync(dir).mtime.toISOString();
    } catch {
      return new Date(0).toISOString();
    }
  }

  allocate(name: string, command: string): Job {
    for (let attempt = 0; attempt < MAX_ALLOCATE_ATTEMPTS; attempt++) {
      const id = generateJobId();
      const paths = this.paths(id);
      try {
        // Non-recursive: fails with EEXIST instead of sharing a directory
        mkdirSync(paths.dir, { mode: 0o700 });
      } catch (err) {
        if (errorCode(err) === "EEXIST") continue;
        throw err;
      }

      const label = name.length > 0 ? name : command;
      atomicWriteFileSync(paths.namePath, label);
      atomicWriteFileSync(paths.commandPath, command);
      return { ...paths, name: label, command, createdAt: this.createdAt(id, paths.dir) };
    }
    throw new Error(`Could not allocate a unique job directory in ${this.jobsDir}`);
  }

  load(jobId: string): Job | null {
    const paths = this.resolve(jobId);
    if (!paths || !existsSync(paths.dir)) return null;

    const command = readText(paths.commandPath) ?? "";
    const name = readText(paths.namePath) ?? (command || jobId);
    return { ...paths, name, command, createdAt: this.createdAt(jobId, paths.dir) };
  }

  private jobIds(): string[] {
    return globSync("*", { cwd: this.jobsDir, withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort(compareJobIds);
  }

  private *records(): Generator<JobRecord> {
    for (const id of this.jobIds()) {
      const job = this.load(id);
      if (!job) continue; // removed externally since enumeration
      yield { ...job, ...this.readStatus(job) };
    }
  }

  list(): Iterable<JobRecord> {
    return { [Symbol.iterator]: () => this.records() };
  }

  readStatus(job: JobRef): JobStatus {
    const paths = this.resolve(job);
    if (!paths) return { state: "unknown" };

    const content = readText(paths.statusPath);
    if (content !== null) {
      const exitCode = parseStatus(content);
      if (exitCode === null) return { state: "unknown" };
      return { state: stateForExitCode(exitCode), exitCode };
    }

    if (!existsSync(paths.dir)) return { state: "unknown" };

    // No status yet: running, unless its runner is gone and never will write one
    const pids = this.readPids(job);
    if (pids && !isProcessAlive(pids.runner)) return { state: "unknown" };
    return { state: "running" };
  }

  readPids(job: JobRef): JobPids | null {
    const paths = this.resolve(job);
    const content = paths && readText(paths.pidPath);
    return content ? parsePids(content) : null;
  }

  tailLog(job: JobRef, lines: number): string[] {
    const paths = this.resolve(job);
    if (lines <= 0 || !paths) return [];
    const content = readText(paths.logPath);
    if (!content) return [];

    const all = content.split("\n");
    if (all[all.length - 1] === "") all.pop();
    return all.slice(-lines);
  }

  readLog(job: JobRef, offset = 0): Buffer | null {
    const paths = this.resolve(job);
    if (!paths) return null;
    try {
      return readFileSync(paths.logPath).subarray(Math.max(0, offset));
    } catch {
      return null;
    }
  }

  writeStatus(job: Job, exitCode: number): void {
    atomicCreateFileSync(job.statusPath, formatStatus(exitCode));
  }

  writePids(job: Job, pids: JobPids, options: { exclusive?: boolean } = {}): boolean {
    const content = JSON.stringify(pids);
    if (!options.exclusive) {
      atomicWriteFileSync(job.pidPath, content);
      return true;
    }
    try {
      atomicCreateFileSync(job.pidPath, content);
      return true;
    } catch (err) {
      if (errorCode(err) === "EEXIST") return false;
      throw err;
    }
  }
}

// JobStore interface: abstracts the on-disk job table.
// The store owns the layout; the runner handling a job is the only writer of
// that job's log, pid and status files.

import type { Job, JobPids, JobRecord, JobStatus } from "../jobs.ts";

export type JobRef = Job | string;

export interface JobStore {
  readonly root: string;
  readonly jobsDir: string;

  allocate(name: string, command: string): Job;
  load(jobId: string): Job | null;
  list(): Iterable<JobRecord>;
  readStatus(job: JobRef): JobStatus;
  tailLog(job: JobRef, lines: number): string[];
  // Raw bytes from a byte offset; callers decode
  readLog(job: JobRef, offset?: number): Buffer | null;
  writeStatus(job: Job, exitCode: number): void;
  readPids(job: JobRef): JobPids | null;
  // With `exclusive`, an existing pid.json is kept and false is returned
  writePids(job: Job, pids: JobPids, options?: { exclusive?: boolean }): boolean;
}

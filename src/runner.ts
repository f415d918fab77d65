// Process runner: executes shell command strings inline or as tracked background jobs.
//
// Command strings are passed to the shell untouched: no quoting, escaping or
// validation happens here. Callers that interpolate values into a command are
// responsible for quoting them.

import { spawn, spawnSync, type ChildProcess } from "child_process";
import { errorMessage } from "./errors.ts";
import {
  ABNORMAL_EXIT_CODE,
  SPAWN_FAILED_EXIT_CODE,
  type Job,
  type JobOutcome,
} from "./jobs.ts";
import { LogSink, type ProcessResult } from "./log-sink.ts";
import type { Logger } from "./logger.ts";
import type { JobStore } from "./store/index.ts";

export interface RunnerOptions {
  shell: string;
  logger: Logger;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  // stdio for synchronous runs; interactive callers want "inherit"
  syncStdio?: "inherit" | "ignore";
}

export interface ExecuteOptions {
  background?: boolean;
  name?: string;
}

export interface StartedJob {
  job: Job;
  // Resolves once the status file is written; never rejects
  completion: Promise<JobOutcome>;
}

type ExitEvent =
  | { kind: "closed"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "spawn-failed"; error: Error };

function spawnFailure(err: unknown): ProcessResult {
  return {
    exitCode: SPAWN_FAILED_EXIT_CODE,
    signal: null,
    error: `spawn failed: ${errorMessage(err)}`,
  };
}

function toProcessResult(event: ExitEvent): ProcessResult {
  if (event.kind === "spawn-failed") return spawnFailure(event.error);
  if (event.code !== null) return { exitCode: event.code, signal: event.signal, error: null };
  return { exitCode: ABNORMAL_EXIT_CODE, signal: event.signal, error: null };
}

/**
 * Resolve on "close" (process gone and its pipes drained), or on "error" when
 * the process never started. Errors after a successful start go to onLateError.
 */
function waitForExit(child: ChildProcess, onLateError: (err: Error) => void): Promise<ExitEvent> {
  return new Promise((resolve) => {
    child.on("error", (error) => {
      if (child.pid === undefined) {
        resolve({ kind: "spawn-failed", error });
      } else {
        onLateError(error);
      }
    });
    child.once("close", (code, signal) => resolve({ kind: "closed", code, signal }));
  });
}

export class ProcessRunner {
  private readonly store: JobStore;
  private readonly options: RunnerOptions;
  private readonly inflight = new Map<string, Promise<JobOutcome>>();

  constructor(store: JobStore, options: RunnerOptions) {
    this.store = store;
    this.options = options;
  }

  execute(command: string, options: { background: true; name?: string }): string;
  execute(command: string, options?: { background?: false }): number;
  execute(command: string, options: ExecuteOptions): string | number;
  execute(command: string, options: ExecuteOptions = {}): string | number {
    if (options.background) {
      return this.start(command, options.name).job.id;
    }
    return this.runSync(command);
  }

  /** Blocking run; returns the exit code. No job record is created. */
  runSync(command: string): number {
    const result = spawnSync(this.options.shell, ["-c", command], {
      cwd: this.options.cwd,
      env: this.options.env ?? process.env,
      stdio: this.options.syncStdio ?? "inherit",
    });

    if (result.error) {
      this.options.logger.error(`spawn ${this.options.shell}`, result.error);
      return SPAWN_FAILED_EXIT_CODE;
    }
    return result.status ?? ABNORMAL_EXIT_CODE;
  }

  /** Allocate a job and run it in the background. Returns before the command starts producing output. */
  start(command: string, name?: string): StartedJob {
    const job = this.store.allocate(name ?? command, command);
    const completion = this.run(job);
    this.inflight.set(job.id, completion);
    void completion.then(() => this.inflight.delete(job.id));
    return { job, completion };
  }

  /** Drive an already allocated job to completion. */
  async run(job: Job): Promise<JobOutcome> {
    try {
      return await this.drive(job);
    } catch (err) {
      this.options.logger.error(`job ${job.id}`, err);
      try {
        this.store.writeStatus(job, ABNORMAL_EXIT_CODE);
      } catch (statusErr) {
        this.options.logger.error(`status write (${job.id})`, statusErr);
      }
      return {
        jobId: job.id,
        exitCode: ABNORMAL_EXIT_CODE,
        state: "failed",
        signal: null,
        error: errorMessage(err),
      };
    }
  }

  /** Wait for every background job started by this runner. */
  async settled(): Promise<JobOutcome[]> {
    return Promise.all([...this.inflight.values()]);
  }

  get activeJobIds(): string[] {
    return [...this.inflight.keys()];
  }

  private recordPids(job: Job, child: number | null): void {
    try {
      this.store.writePids(job, { runner: process.pid, child });
    } catch (err) {
      this.options.logger.error(`pid write (${job.id})`, err);
    }
  }

  private async drive(job: Job): Promise<JobOutcome> {
    const sink = await LogSink.open(job, this.store, this.options.logger);
    await sink.begin();

    let child: ChildProcess;
    try {
      child = spawn(this.options.shell, ["-c", job.command], {
        cwd: this.options.cwd,
        env: this.options.env ?? process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (err) {
      this.recordPids(job, null);
      return sink.finish(spawnFailure(err));
    }

    this.recordPids(job, child.pid ?? null);

    const exited = waitForExit(child, (err) => this.options.logger.error(`process (${job.id})`, err));
    // stdout and stderr land in the same log, in arrival order
    const drained = Promise.all([sink.consume(child.stdout), sink.consume(child.stderr)]);

    const event = await exited;
    if (event.kind === "spawn-failed") {
      sink.abandon([child.stdout, child.stderr]);
    }
    await drained;

    return sink.finish(toProcessResult(event));
  }
}

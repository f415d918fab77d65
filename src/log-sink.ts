// Log sink: drains a job's live output into log.txt, then records its status.
// Owned by the runner task handling one job; nothing else writes these files.

import { open, type FileHandle } from "fs/promises";
import type { Readable } from "stream";
import { stateForExitCode, type Job, type JobOutcome } from "./jobs.ts";
import type { Logger } from "./logger.ts";
import type { JobStore } from "./store/index.ts";

export interface ProcessResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  error: string | null;
}

const NEWLINE = 0x0a;

export function formatEndMarker(result: ProcessResult, now: Date = new Date()): string {
  const details = [`exit ${result.exitCode}`];
  if (result.signal) details.push(`signal ${result.signal}`);
  if (result.error) details.push(result.error);
  return `== END: ${now.toISOString()} (${details.join(", ")}) ==\n`;
}

export class LogSink {
  private readonly job: Job;
  private readonly store: JobStore;
  private readonly logger: Logger;
  private handle: FileHandle | null;
  private writeFailed = false;
  private abandoned = false;
  private atLineStart = true;

  private constructor(job: Job, store: JobStore, logger: Logger, handle: FileHandle | null) {
    this.job = job;
    this.store = store;
    this.logger = logger;
    this.handle = handle;
  }

  /**
   * Open the job's log for appending. If that fails the sink still works,
   * discarding output, so the job can reach a terminal status.
   */
  static async open(job: Job, store: JobStore, logger: Logger): Promise<LogSink> {
    let handle: FileHandle | null = null;
    try {
      handle = await open(job.logPath, "a", 0o600);
    } catch (err) {
      logger.error(`log open (${job.id})`, err);
    }
    return new LogSink(job, store, logger, handle);
  }

  async begin(now: Date = new Date()): Promise<void> {
    await this.write(`== JOB: ${this.job.name} ==\n== START: ${now.toISOString()} ==\n`);
  }

  /** Each write is awaited before the next, so readers see output as it arrives. */
  async write(chunk: string | Uint8Array): Promise<void> {
    if (!this.handle || this.writeFailed || chunk.length === 0) return;
    try {
      if (typeof chunk === "string") {
        await this.handle.write(chunk);
        this.atLineStart = chunk.endsWith("\n");
      } else {
        await this.handle.write(chunk);
        this.atLineStart = chunk[chunk.length - 1] === NEWLINE;
      }
    } catch (err) {
      this.writeFailed = true;
      this.logger.error(`log write (${this.job.id})`, err);
    }
  }

  /** Read a stream to its end. Keeps draining after a write failure so the process never stalls on a full pipe. */
  async consume(stream: Readable | null): Promise<void> {
    if (!stream) return;
    const chunks: AsyncIterable<unknown> = stream;
    try {
      for await (const chunk of chunks) {
        if (typeof chunk === "string" || chunk instanceof Uint8Array) {
          await this.write(chunk);
        }
      }
    } catch (err) {
      if (!this.abandoned) this.logger.error(`output stream (${this.job.id})`, err);
    }
  }

  /** Tear down pipes of a process that never started. */
  abandon(streams: Array<Readable | null>): void {
    this.abandoned = true;
    for (const stream of streams) stream?.destroy();
  }

  private async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;
    try {
      await handle.close();
    } catch (err) {
      this.logger.error(`log close (${this.job.id})`, err);
    }
  }

  /**
   * Append the end marker, close the log, then write the status file.
   * The status write is always attempted and always last. Never throws.
   */
  async finish(result: ProcessResult, now: Date = new Date()): Promise<JobOutcome> {
    await this.write((this.atLineStart ? "" : "\n") + formatEndMarker(result, now));
    await this.close();

    try {
      this.store.writeStatus(this.job, result.exitCode);
    } catch (err) {
      this.logger.error(`status write (${this.job.id})`, err);
    }

    return {
      jobId: this.job.id,
      exitCode: result.exitCode,
      state: stateForExitCode(result.exitCode),
      signal: result.signal,
      error: result.error,
    };
  }
}

// Incremental log reader used by `watch`.

import { StringDecoder } from "string_decoder";
import type { JobRef, JobStore } from "./store/index.ts";

export class LogFollower {
  private readonly store: JobStore;
  private readonly job: JobRef;
  private readonly decoder = new StringDecoder("utf8");
  private offset = 0;

  constructor(store: JobStore, job: JobRef) {
    this.store = store;
    this.job = job;
  }

  /** Bytes consumed so far. */
  get position(): number {
    return this.offset;
  }

  /**
   * Text appended since the last read. A character split across two reads is
   * held back until its remaining bytes arrive.
   */
  read(): string {
    const bytes = this.store.readLog(this.job, this.offset);
    if (!bytes || bytes.length === 0) return "";
    this.offset += bytes.length;
    return this.decoder.write(bytes);
  }

  /** Whatever the decoder still holds once the log is complete. */
  end(): string {
    return this.decoder.end();
  }
}

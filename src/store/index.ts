// Store factory: returns the JobStore for a resolved root.

import type { JobStore } from "./job-store.ts";
import { FsJobStore } from "./fs-store.ts";

export function openStore(root: string): JobStore {
  return new FsJobStore(root);
}

export type { JobRef, JobStore } from "./job-store.ts";
export { FsJobStore, isProcessAlive } from "./fs-store.ts";

// Shared filesystem utilities for atomic writes and permission management

import { writeFileSync, renameSync, mkdirSync, linkSync, unlinkSync } from "fs";

function tmpPathFor(filePath: string): string {
  return `${filePath}.${process.pid}.${Date.now()}.tmp`;
}

/**
 * Write file atomically: write to temp file, then rename.
 * rename() is atomic on the same filesystem (POSIX guarantee).
 */
export function atomicWriteFileSync(filePath: string, data: string, mode = 0o600): void {
  const tmpPath = tmpPathFor(filePath);
  writeFileSync(tmpPath, data, { mode });
  renameSync(tmpPath, filePath);
}

/**
 * Create a file exactly once, atomically. The content is staged in a temp
 * file and hard-linked into place; link() fails with EEXIST if the target
 * already exists, so an existing file is never replaced and readers never see
 * a partial write.
 */
export function atomicCreateFileSync(filePath: string, data: string, mode = 0o600): void {
  const tmpPath = tmpPathFor(filePath);
  writeFileSync(tmpPath, data, { mode });
  try {
    linkSync(tmpPath, filePath);
  } finally {
    unlinkSync(tmpPath);
  }
}

/**
 * Ensure directory exists with restrictive permissions.
 * mode 0o700 = owner-only read/write/execute.
 */
export function ensureDirSync(dirPath: string, mode = 0o700): void {
  mkdirSync(dirPath, { recursive: true, mode });
}

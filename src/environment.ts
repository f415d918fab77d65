// Terminal detection and job-root resolution

import { accessSync, constants } from "fs";
import { join } from "path";
import type { Config } from "./config.ts";
import { ConfigurationError, errorMessage } from "./errors.ts";
import { ensureDirSync } from "./fs-utils.ts";

export const JOBS_DIRNAME = "jobs";

export interface TtyLike {
  isTTY?: boolean;
}

export function rootCandidates(config: Config): string[] {
  if (config.rootOverride) return [config.rootOverride];
  return [...config.rootCandidates, config.fallbackRoot];
}

/**
 * Pick the first usable job root and make sure `<root>/jobs` exists.
 * Throws ConfigurationError when no candidate can be created and written.
 */
export function resolveRoot(config: Config): string {
  const failures: string[] = [];

  for (const candidate of rootCandidates(config)) {
    const jobsDir = join(candidate, JOBS_DIRNAME);
    try {
      ensureDirSync(jobsDir);
      accessSync(jobsDir, constants.W_OK);
      return candidate;
    } catch (err) {
      failures.push(`  ${candidate}: ${errorMessage(err)}`);
    }
  }

  throw new ConfigurationError(
    `No writable job root found. Tried:\n${failures.join("\n")}`
  );
}

export function isInteractive(
  config: Config,
  streams: { stdin: TtyLike; stdout: TtyLike } = { stdin: process.stdin, stdout: process.stdout }
): boolean {
  if (config.forceNonInteractive) return false;
  return streams.stdin.isTTY === true && streams.stdout.isTTY === true;
}

/**
 * Completion policy for synchronous runs: interactive sessions (or an
 * explicit override) exit with the command's code, scripted ones only print it.
 */
export function shouldExitWithCode(config: Config, interactive: boolean): boolean {
  return interactive || config.forceExitOnCompletion;
}

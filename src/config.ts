// Configuration for bgjob

import { tmpdir } from "os";
import { join, resolve } from "path";

export const ENV_VARS = {
  root: "BGJOB_ROOT",
  nonInteractive: "BGJOB_NONINTERACTIVE",
  exitOnCompletion: "BGJOB_EXIT_ON_COMPLETION",
  shell: "BGJOB_SHELL",
} as const;

export interface Config {
  // Explicit job root; when set no other location is probed
  rootOverride: string | null;

  // Preferred writable locations, tried in order
  rootCandidates: string[];

  // Last resort, relative to the working directory at startup
  fallbackRoot: string;

  forceNonInteractive: boolean;
  forceExitOnCompletion: boolean;

  // Shell used for command strings (`<shell> -c <command>`)
  shell: string;

  // CLI defaults
  jobsListLimit: number;
  tailLines: number;
  watchIntervalMs: number;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function envFlag(value: string | undefined): boolean {
  if (!value) return false;
  return TRUTHY.has(value.trim().toLowerCase());
}

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Config {
  const rootCandidates: string[] = [];
  const stateHome = nonEmpty(env.XDG_STATE_HOME);
  if (stateHome) rootCandidates.push(join(stateHome, "bgjob"));
  const home = nonEmpty(env.HOME);
  if (home) rootCandidates.push(join(home, ".bgjob"));
  rootCandidates.push(join(tmpdir(), "bgjob"));

  const override = nonEmpty(env[ENV_VARS.root]);

  return {
    rootOverride: override ? resolve(cwd, override) : null,
    rootCandidates,
    fallbackRoot: join(cwd, ".bgjob"),
    forceNonInteractive: envFlag(env[ENV_VARS.nonInteractive]),
    forceExitOnCompletion: envFlag(env[ENV_VARS.exitOnCompletion]),
    shell: nonEmpty(env[ENV_VARS.shell]) ?? "/bin/sh",
    jobsListLimit: 20,
    tailLines: 50,
    watchIntervalMs: 1000,
  };
}

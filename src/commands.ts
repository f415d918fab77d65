// bgjob subcommands. `cli.ts` parses argv and hands off to `dispatch`.

import { spawn, spawnSync } from "child_process";
import { writeFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import chalk from "chalk";
import { stripAnsiCodes } from "./ansi.ts";
import { commandLine, type Options } from "./args.ts";
import { ENV_VARS, type Config } from "./config.ts";
import { isInteractive, resolveRoot, shouldExitWithCode } from "./environment.ts";
import { JobNotFoundError, UsageError } from "./errors.ts";
import { SPAWN_FAILED_EXIT_CODE, type Job, type JobState } from "./jobs.ts";
import { LogFollower } from "./log-follower.ts";
import { createLogger, type Logger } from "./logger.ts";
import { StatusReporter, formatJobTable, reportFileName, toSummary } from "./reporter.ts";
import { ProcessRunner } from "./runner.ts";
import { openStore, type JobStore } from "./store/index.ts";

const CLI_ENTRY = fileURLToPath(new URL("./cli.ts", import.meta.url));

export const HELP = `
bgjob - run shell commands inline or as tracked background jobs

Usage:
  bgjob run <command...>              Run a command and wait for it
  bgjob start <command...> [-n name]  Start a command in the background
  bgjob jobs [--json] [-l limit]      List recent jobs
  bgjob status <jobId>                Show job state and exit code
  bgjob tail <jobId> [lines]          Print the last lines of a job's log (default: 50)
  bgjob watch <jobId>                 Follow a job's log until it finishes
  bgjob report                        Write a report of all jobs under the job root
  bgjob health                        Check the shell and the job root

Options:
  -n, --name <label>    Job label (default: the command itself)
  -l, --limit <n>       Number of jobs to list (default: 20)
  --json                Output JSON (jobs command only)
  --strip-ansi          Remove terminal escape codes (tail and watch)
  --                    Treat everything after as the command line
  -h, --help            Show this help

Environment:
  ${ENV_VARS.root}                 Job root (default: first writable of $XDG_STATE_HOME/bgjob,
                             ~/.bgjob, <tmpdir>/bgjob, ./.bgjob)
  ${ENV_VARS.nonInteractive}       Treat the session as non-interactive
  ${ENV_VARS.exitOnCompletion}   Exit with the command's code even when non-interactive
  ${ENV_VARS.shell}                Shell used to run commands (default: /bin/sh)

Files:
  <root>/jobs/<id>/name.txt, command.txt, log.txt, status.txt, pid.json

Commands are handed to the shell as-is. Quote anything you interpolate.
`;

export interface Context {
  config: Config;
  root: string;
  store: JobStore;
  logger: Logger;
  runner: ProcessRunner;
}

export function openContext(config: Config, logger?: Logger): Context {
  const root = resolveRoot(config);
  const store = openStore(root);
  const log = logger ?? createLogger({ errorLogPath: join(root, "error_log.txt") });
  const runner = new ProcessRunner(store, { shell: config.shell, logger: log });
  return { config, root, store, logger: log, runner };
}

function colorState(state: JobState): string {
  switch (state) {
    case "succeeded":
      return chalk.green(state);
    case "failed":
      return chalk.red(state);
    case "running":
      return chalk.cyan(state);
    default:
      return chalk.yellow(state);
  }
}

function requireJob(store: JobStore, jobId: string | undefined): Job {
  if (!jobId) throw new UsageError("No job ID provided");
  const job = store.load(jobId);
  if (!job) throw new JobNotFoundError(jobId);
  return job;
}

function requireCommand(positional: string[]): string {
  const command = commandLine(positional);
  if (!command.trim()) throw new UsageError("No command provided");
  return command;
}

/** Resolves with the launched supervisor's pid, or null if it could not start. */
export type SupervisorLauncher = (ctx: Context, job: Job) => Promise<number | null>;

/**
 * Re-run this CLI detached as `supervise <id>` so the job outlives the
 * invoking shell.
 */
export const launchSupervisor: SupervisorLauncher = (ctx, job) => {
  return new Promise((resolve) => {
    const child = spawn(process.execPath, [...process.execArgv, CLI_ENTRY, "supervise", job.id], {
      detached: true,
      stdio: "ignore",
      env: { ...process.env, [ENV_VARS.root]: ctx.root },
    });
    child.once("spawn", () => {
      child.unref();
      resolve(child.pid ?? null);
    });
    child.once("error", (err) => {
      ctx.logger.error(`supervisor launch (${job.id})`, err);
      resolve(null);
    });
  });
};

/**
 * Allocate a job and hand it to a detached supervisor. When no supervisor
 * starts, this process is the job's only writer and records the spawn failure.
 */
export async function startJob(
  ctx: Context,
  command: string,
  name: string | null,
  launch: SupervisorLauncher = launchSupervisor
): Promise<{ job: Job; pid: number | null }> {
  const job = ctx.store.allocate(name ?? command, command);
  const pid = await launch(ctx, job);
  if (pid === null) {
    ctx.store.writeStatus(job, SPAWN_FAILED_EXIT_CODE);
    return { job, pid };
  }
  // Until the supervisor records itself, its pid lets readers spot a crash
  // before the runner starts. Its own record wins if it is already there.
  ctx.store.writePids(job, { runner: pid, child: null }, { exclusive: true });
  return { job, pid };
}

/** Poll-follow a job's log until its status file appears. */
export function watchJob(
  ctx: Context,
  job: Job,
  stripAnsi: boolean,
  write: (text: string) => void = (text) => process.stdout.write(text)
): Promise<JobState> {
  const follower = new LogFollower(ctx.store, job);
  const emit = (text: string) => {
    if (text) write(stripAnsi ? stripAnsiCodes(text) : text);
  };

  return new Promise((resolve) => {
    const poll = () => {
      // Status before log: once status exists the log is complete
      const status = ctx.store.readStatus(job);
      emit(follower.read());
      if (status.state !== "running") {
        emit(follower.end());
        clearInterval(timer);
        resolve(status.state);
      }
    };
    const timer = setInterval(poll, ctx.config.watchIntervalMs);
    poll();
  });
}

export async function dispatch(
  command: string,
  positional: string[],
  options: Options,
  config: Config
): Promise<number> {
  switch (command) {
    case "health": {
      const check = spawnSync(config.shell, ["-c", "exit 0"], { stdio: "ignore" });
      if (check.error || check.status !== 0) {
        console.error(`shell: ${config.shell} unavailable${check.error ? ` (${check.error.message})` : ""}`);
        return 1;
      }
      console.log(`shell: ${config.shell} OK`);
      const root = resolveRoot(config);
      console.log(`root: ${root}`);
      console.log(`interactive: ${isInteractive(config) ? "yes" : "no"}`);
      console.log("Status: Ready");
      return 0;
    }

    case "run": {
      const cmd = requireCommand(positional);
      const ctx = openContext(config);
      console.error(chalk.cyan(`$ ${cmd}`));
      const code = ctx.runner.execute(cmd, { background: false });
      if (shouldExitWithCode(config, isInteractive(config))) return code;
      console.log(`exit ${code}`);
      return 0;
    }

    case "start": {
      const cmd = requireCommand(positional);
      const ctx = openContext(config);
      const { job, pid } = await startJob(ctx, cmd, options.name);
      if (pid === null) {
        console.error(`Could not start job ${job.id}`);
        return 1;
      }
      console.log(job.id);
      ctx.logger.info(`Started: ${job.name} (job-id: ${job.id}, pid: ${pid})`);
      ctx.logger.info(`Log: ${job.logPath}`);
      return 0;
    }

    case "supervise": {
      const ctx = openContext(config);
      const job = requireJob(ctx.store, positional[0]);
      const status = ctx.store.readStatus(job);
      if (status.state !== "running") {
        console.error(`Job ${job.id} already ${status.state}`);
        return 1;
      }
      const outcome = await ctx.runner.run(job);
      return outcome.exitCode === 0 ? 0 : 1;
    }

    case "jobs": {
      const ctx = openContext(config);
      const reporter = new StatusReporter(ctx.store);
      const rows = reporter.recent(options.limit ?? config.jobsListLimit).map(toSummary);
      if (options.json) {
        console.log(JSON.stringify({ generated_at: new Date().toISOString(), jobs: rows }, null, 2));
      } else {
        console.log(formatJobTable(rows));
      }
      return 0;
    }

    case "status": {
      const ctx = openContext(config);
      const job = requireJob(ctx.store, positional[0]);
      const status = ctx.store.readStatus(job);
      const pids = ctx.store.readPids(job);

      console.log(`Job: ${job.id}`);
      console.log(`Name: ${job.name}`);
      console.log(`Command: ${job.command}`);
      console.log(`State: ${colorState(status.state)}`);
      if (status.exitCode !== undefined) {
        console.log(`Exit code: ${status.exitCode}`);
      }
      console.log(`Created: ${job.createdAt}`);
      if (pids) {
        console.log(`Runner pid: ${pids.runner}`);
        if (pids.child !== null) console.log(`Process pid: ${pids.child}`);
      }
      console.log(`Log: ${job.logPath}`);
      return 0;
    }

    case "tail": {
      const ctx = openContext(config);
      const job = requireJob(ctx.store, positional[0]);
      const raw = positional[1];
      const lines = raw === undefined ? config.tailLines : Number(raw);
      if (!Number.isInteger(lines) || lines < 0) {
        throw new UsageError(`Invalid line count: ${raw}`);
      }
      for (const line of ctx.store.tailLog(job, lines)) {
        console.log(options.stripAnsi ? stripAnsiCodes(line) : line);
      }
      return 0;
    }

    case "watch": {
      const ctx = openContext(config);
      const job = requireJob(ctx.store, positional[0]);
      console.error(`Watching ${job.id}... (Ctrl+C to stop)`);
      process.once("SIGINT", () => {
        console.error("\nStopped watching");
        process.exit(0);
      });
      const state = await watchJob(ctx, job, options.stripAnsi);
      console.error(`\nJob ${colorState(state)}`);
      return 0;
    }

    case "report": {
      const ctx = openContext(config);
      const now = new Date();
      const out = join(ctx.root, reportFileName(now));
      writeFileSync(out, new StatusReporter(ctx.store).renderReport(now), { mode: 0o600 });
      ctx.logger.info(`Report written: ${out}`);
      console.log(out);
      return 0;
    }

    default:
      console.log(HELP);
      return command ? 1 : 0;
  }
}

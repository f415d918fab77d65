import { mkdtempSync, readFileSync, realpathSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ABNORMAL_EXIT_CODE, SPAWN_FAILED_EXIT_CODE, type Job } from "./jobs.ts";
import { createMemoryLogger } from "./logger.ts";
import { ProcessRunner, type RunnerOptions } from "./runner.ts";
import { StatusReporter } from "./reporter.ts";
import { FsJobStore } from "./store/index.ts";

const WAIT = { timeout: 5000, interval: 20 };
const END_MARKER = /^== END: \S+ \(exit (-?\d+)(, .*)?\) ==$/;

let root: string;
let store: FsJobStore;

function makeRunner(overrides: Partial<RunnerOptions> = {}) {
  const logger = createMemoryLogger();
  const runner = new ProcessRunner(store, {
    shell: "/bin/sh",
    logger,
    syncStdio: "ignore",
    ...overrides,
  });
  return { runner, logger };
}

async function childPid(job: Job): Promise<number> {
  return vi.waitFor(() => {
    const pids = store.readPids(job);
    if (!pids || pids.child === null) throw new Error("child pid not recorded yet");
    return pids.child;
  }, WAIT);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "bgjob-runner-"));
  store = new FsJobStore(root);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("synchronous execution", () => {
  test("returns the command's exit code", () => {
    const { runner } = makeRunner();
    expect(runner.execute("exit 3", { background: false })).toBe(3);
    expect(runner.execute("true")).toBe(0);
  });

  test("creates no job record", () => {
    const { runner } = makeRunner();
    runner.execute("true");
    expect(Array.from(store.list())).toHaveLength(0);
  });

  test("returns the spawn-failure code when the shell is missing", () => {
    const { runner, logger } = makeRunner({ shell: "/nonexistent/shell" });
    expect(runner.execute("true")).toBe(SPAWN_FAILED_EXIT_CODE);
    expect(logger.entries.map((e) => e.level)).toEqual(["error"]);
  });
});

describe("background execution", () => {
  test("returns a job id immediately and records the outcome", async () => {
    const { runner, logger } = makeRunner();

    const id = runner.execute("echo hello", { background: true, name: "greet" });
    expect(typeof id).toBe("string");
    expect(store.readStatus(id)).toEqual({ state: "running" });

    const [outcome] = await runner.settled();
    expect(outcome).toEqual({ jobId: id, exitCode: 0, state: "succeeded", signal: null, error: null });

    const job = store.load(id);
    expect(job).not.toBeNull();
    if (!job) return;
    expect(readFileSync(job.namePath, "utf-8")).toBe("greet");
    expect(readFileSync(job.statusPath, "utf-8")).toBe("exit 0\n");

    const lines = readFileSync(job.logPath, "utf-8").trimEnd().split("\n");
    expect(lines[0]).toBe("== JOB: greet ==");
    expect(lines).toContain("hello");
    expect(lines[lines.length - 1]).toMatch(END_MARKER);
    expect(logger.entries).toEqual([]);
  });

  test("merges stderr into the log and records a failing exit", async () => {
    const { runner } = makeRunner();
    const { job, completion } = runner.start("echo oops >&2; exit 1");

    const outcome = await completion;
    expect(outcome.exitCode).toBe(1);
    expect(outcome.state).toBe("failed");
    expect(readFileSync(job.statusPath, "utf-8")).toBe("exit 1\n");
    expect(store.tailLog(job, 2)[0]).toBe("oops");
    expect(store.readStatus(job)).toEqual({ state: "failed", exitCode: 1 });
  });

  test("uses the command as the name when none is given", async () => {
    const { runner } = makeRunner();
    const { job, completion } = runner.start("echo unnamed");
    await completion;
    expect(store.load(job.id)?.name).toBe("echo unnamed");
  });

  test("records a spawn failure as a failed job", async () => {
    const { runner } = makeRunner({ shell: "/nonexistent/shell" });
    const { job, completion } = runner.start("echo never");

    const outcome = await completion;
    expect(outcome.exitCode).toBe(SPAWN_FAILED_EXIT_CODE);
    expect(outcome.state).toBe("failed");
    expect(outcome.error).toMatch(/^spawn failed: /);
    expect(store.readStatus(job)).toEqual({ state: "failed", exitCode: SPAWN_FAILED_EXIT_CODE });
    expect(store.readPids(job)).toEqual({ runner: process.pid, child: null });

    const last = store.tailLog(job, 1)[0];
    expect(last).toMatch(END_MARKER);
    expect(last).toContain("(exit -1, spawn failed: ");
  });

  test("records a job killed from outside with the abnormal-exit code", async () => {
    const { runner } = makeRunner();
    const { job, completion } = runner.start("exec sleep 30");

    process.kill(await childPid(job), "SIGTERM");
    const outcome = await completion;

    expect(outcome.exitCode).toBe(ABNORMAL_EXIT_CODE);
    expect(outcome.signal).toBe("SIGTERM");
    expect(store.readStatus(job)).toEqual({ state: "failed", exitCode: ABNORMAL_EXIT_CODE });
    expect(store.tailLog(job, 1)[0]).toContain("(exit -2, signal SIGTERM)");
  });

  test("tail never returns more than requested while a job runs", async () => {
    const { runner } = makeRunner();
    const { job, completion } = runner.start("printf '1\\n2\\n3\\n4\\n'; exec sleep 30");

    await vi.waitFor(() => {
      expect(store.tailLog(job, 1)).toEqual(["4"]);
    }, WAIT);
    expect(store.tailLog(job, 2)).toEqual(["3", "4"]);
    expect(store.readStatus(job)).toEqual({ state: "running" });

    process.kill(await childPid(job), "SIGTERM");
    await completion;
  });

  test("captures large output completely before writing the status", async () => {
    const { runner } = makeRunner();
    const { job, completion } = runner.start(
      "i=0; while [ $i -lt 2000 ]; do i=$((i+1)); echo line $i; done"
    );

    await completion;
    const tail = store.tailLog(job, 2);
    expect(tail[0]).toBe("line 2000");
    expect(tail[1]).toMatch(END_MARKER);
    const lines = readFileSync(job.logPath, "utf-8").split("\n");
    expect(lines.filter((line) => line.startsWith("line "))).toHaveLength(2000);
  });

  test("honors the working directory and environment", async () => {
    const cwd = realpathSync(mkdtempSync(join(tmpdir(), "bgjob-cwd-")));
    try {
      const { runner } = makeRunner({ cwd, env: { ...process.env, GREETING: "hi there" } });
      const { job, completion } = runner.start('pwd; echo "$GREETING"');
      await completion;

      const lines = readFileSync(job.logPath, "utf-8").split("\n");
      expect(lines).toContain(cwd);
      expect(lines).toContain("hi there");
    } finally {
      rmSync(cwd, { recursive: true, force: true });
    }
  });

  test("gives concurrent submissions distinct ids and lists them in order", async () => {
    const { runner } = makeRunner();
    const ids = Array.from({ length: 20 }, (_, i) =>
      runner.execute(`echo ${i}`, { background: true, name: `job ${i}` })
    );
    expect(new Set(ids).size).toBe(20);
    expect(runner.activeJobIds).toHaveLength(20);

    const outcomes = await runner.settled();
    expect(outcomes.every((o) => o.exitCode === 0)).toBe(true);

    const summary = new StatusReporter(store).summarize();
    expect(summary.map((row) => row.id)).toEqual(ids);
    expect(summary.every((row) => row.state === "succeeded")).toBe(true);
  });

  test("lists three submissions in submission order", async () => {
    const { runner } = makeRunner();
    runner.execute("true", { background: true, name: "first" });
    runner.execute("false", { background: true, name: "second" });
    runner.execute("exit 7", { background: true, name: "third" });
    await runner.settled();

    const summary = new StatusReporter(store).summarize();
    expect(summary.map(({ name, state, exitCode }) => ({ name, state, exitCode }))).toEqual([
      { name: "first", state: "succeeded", exitCode: 0 },
      { name: "second", state: "failed", exitCode: 1 },
      { name: "third", state: "failed", exitCode: 7 },
    ]);
  });

  test("drives a job allocated elsewhere", async () => {
    const { runner } = makeRunner();
    const job = store.allocate("external", "echo from supervisor");

    const outcome = await runner.run(job);
    expect(outcome.exitCode).toBe(0);
    expect(store.tailLog(job, 2)[0]).toBe("from supervisor");
  });
});

describe("execute with a runtime flag", () => {
  test("takes the background path from a boolean known only at run time", async () => {
    const { runner } = makeRunner();
    const modes: boolean[] = [false, true];

    const [inline, queued] = modes.map((background) => runner.execute("exit 5", { background, name: "five" }));
    expect(inline).toBe(5);
    expect(typeof queued).toBe("string");

    const [outcome] = await runner.settled();
    expect(outcome.jobId).toBe(queued);
    expect(outcome.exitCode).toBe(5);
  });
});

import { spawnSync } from "child_process";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { FsJobStore } from "./store/index.ts";

// Runs the real entry point the way the bin shebang does, with tsx as the loader
const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));
const CLI = fileURLToPath(new URL("./cli.ts", import.meta.url));
const END_MARKER = /^== END: \S+ \(exit (-?\d+)(, .*)?\) ==$/;
const WAIT = { timeout: 12000, interval: 200 };

let root: string;

function bgjob(args: string[], env: NodeJS.ProcessEnv = {}) {
  return spawnSync(process.execPath, ["--import", "tsx", CLI, ...args], {
    cwd: PROJECT_ROOT,
    encoding: "utf-8",
    env: {
      ...process.env,
      BGJOB_ROOT: root,
      BGJOB_NONINTERACTIVE: "1",
      BGJOB_EXIT_ON_COMPLETION: "",
      FORCE_COLOR: "0",
      ...env,
    },
  });
}

function startJob(args: string[]): string {
  const result = bgjob(["start", ...args]);
  expect(result.status).toBe(0);
  const id = result.stdout.trim();
  expect(id).toMatch(/^\d+-\d+-\d+$/);
  return id;
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "bgjob-e2e-"));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("bgjob", { timeout: 30000 }, () => {
  test("start hands the job to a detached supervisor", async () => {
    const id = startJob(["-n", "greet", "echo", "hello"]);

    await vi.waitFor(() => {
      expect(bgjob(["status", id]).stdout.split("\n")).toContain("State: succeeded");
    }, WAIT);

    const status = bgjob(["status", id]).stdout.split("\n");
    expect(status).toContain("Name: greet");
    expect(status).toContain("Command: echo hello");
    expect(status).toContain("Exit code: 0");

    const tail = bgjob(["tail", id, "2"]).stdout.split("\n");
    expect(tail[0]).toBe("hello");
    expect(tail[1]).toMatch(END_MARKER);
  });

  test("watch follows the log through to the end marker", () => {
    const id = startJob(["echo one; sleep 1; echo two"]);

    const result = bgjob(["watch", id]);
    expect(result.status).toBe(0);

    const lines = result.stdout.split("\n");
    expect(lines[0]).toBe("== JOB: echo one; sleep 1; echo two ==");
    expect(lines.slice(2, 4)).toEqual(["one", "two"]);
    expect(lines[4]).toMatch(END_MARKER);
    expect(result.stderr).toContain("Job succeeded");
  });

  test("run reports the exit code without failing a scripted session", () => {
    const result = bgjob(["run", "exit 3"]);
    expect(result.status).toBe(0);
    expect(result.stdout).toBe("exit 3\n");
  });

  test("run exits with the command's code when asked to", () => {
    const result = bgjob(["run", "exit 3"], { BGJOB_EXIT_ON_COMPLETION: "1" });
    expect(result.status).toBe(3);
    expect(result.stdout).toBe("");
  });

  test("tail rejects a bad line count", () => {
    const job = new FsJobStore(root).allocate("t", "true");
    const result = bgjob(["tail", job.id, "lots"]);
    expect(result.status).toBe(1);
    expect(result.stderr).toContain("Error: Invalid line count: lots");
  });
});

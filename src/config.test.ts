import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, test } from "vitest";
import { envFlag, loadConfig } from "./config.ts";

describe("loadConfig", () => {
  test("probes home and tmp, falling back to the working directory", () => {
    const config = loadConfig({ HOME: "/home/op" }, "/work");

    expect(config.rootOverride).toBeNull();
    expect(config.rootCandidates).toEqual(["/home/op/.bgjob", join(tmpdir(), "bgjob")]);
    expect(config.fallbackRoot).toBe("/work/.bgjob");
    expect(config.shell).toBe("/bin/sh");
    expect(config.forceNonInteractive).toBe(false);
    expect(config.forceExitOnCompletion).toBe(false);
  });

  test("prefers XDG_STATE_HOME when set", () => {
    const config = loadConfig({ XDG_STATE_HOME: "/state", HOME: "/home/op" }, "/work");
    expect(config.rootCandidates.slice(0, 2)).toEqual(["/state/bgjob", "/home/op/.bgjob"]);
  });

  test("resolves a relative root override against the working directory", () => {
    expect(loadConfig({ BGJOB_ROOT: "jobs-root" }, "/work").rootOverride).toBe("/work/jobs-root");
    expect(loadConfig({ BGJOB_ROOT: "/var/lib/bgjob" }, "/work").rootOverride).toBe("/var/lib/bgjob");
  });

  test("ignores a blank override", () => {
    expect(loadConfig({ BGJOB_ROOT: "   " }, "/work").rootOverride).toBeNull();
  });

  test("reads session flags and shell", () => {
    const config = loadConfig(
      { BGJOB_NONINTERACTIVE: "TRUE", BGJOB_EXIT_ON_COMPLETION: "1", BGJOB_SHELL: " /bin/bash " },
      "/work"
    );
    expect(config.forceNonInteractive).toBe(true);
    expect(config.forceExitOnCompletion).toBe(true);
    expect(config.shell).toBe("/bin/bash");
  });
});

describe("envFlag", () => {
  test("accepts common truthy spellings", () => {
    for (const value of ["1", "true", "Yes", " on "]) {
      expect(envFlag(value)).toBe(true);
    }
  });

  test("treats everything else as false", () => {
    for (const value of [undefined, "", "0", "false", "off", "nope"]) {
      expect(envFlag(value)).toBe(false);
    }
  });
});

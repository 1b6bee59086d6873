import { describe, it, expect } from "vitest";
import { skippedStep, succeeded, toStepLog } from "../../../../src/core/runtime/steps.js";
import { processResult } from "../../../helpers/mocks.js";

describe("toStepLog", () => {
  it("copies the process result", () => {
    const step = toStepLog("runtime_command", processResult("python main.py", { stdout: "ok", exitCode: 0 }), 100);
    expect(step).toEqual({
      label: "runtime_command",
      command: "python main.py",
      exitCode: 0,
      timedOut: false,
      stdout: "ok",
      stderr: "",
      truncated: false,
      durationMs: 1,
    });
  });

  it("keeps the tail of each stream", () => {
    const step = toStepLog("main", processResult("cmd", { stdout: "abcdef", stderr: "123456" }), 3);
    expect(step.stdout).toBe("def");
    expect(step.stderr).toBe("456");
    expect(step.truncated).toBe(true);
  });

  it("flags output already dropped at capture", () => {
    const step = toStepLog("main", processResult("cmd", { stdout: "tail", stdoutLength: 2_000_000 }), 100);
    expect(step.stdout).toBe("tail");
    expect(step.truncated).toBe(true);
  });

  it("appends a spawn error to stderr", () => {
    const step = toStepLog("main", processResult("cmd", { exitCode: null, stderr: "", error: "spawn x ENOENT" }), 100);
    expect(step.stderr).toBe("spawn x ENOENT");
  });
});

describe("skippedStep", () => {
  it("records the note as stdout", () => {
    expect(skippedStep("dependency_install", "skipped")).toMatchObject({
      command: "skip",
      exitCode: 0,
      stdout: "skipped",
    });
  });
});

describe("succeeded", () => {
  it("requires exit 0 without timeout, abort or error", () => {
    expect(succeeded(processResult("c"))).toBe(true);
    expect(succeeded(processResult("c", { exitCode: 1 }))).toBe(false);
    expect(succeeded(processResult("c", { timedOut: true }))).toBe(false);
    expect(succeeded(processResult("c", { aborted: true }))).toBe(false);
    expect(succeeded(processResult("c", { error: "boom" }))).toBe(false);
  });
});

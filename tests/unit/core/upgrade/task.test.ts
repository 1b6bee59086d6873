import { describe, it, expect } from "vitest";
import { CollaboratorError } from "../../../../src/core/errors.js";
import { passedResult } from "../../../../src/core/types.js";
import { InvalidTransitionError, UpgradeTask } from "../../../../src/core/upgrade/task.js";
import { failedResult } from "../../../helpers/fixtures.js";

describe("UpgradeTask", () => {
  it("starts pending with the original content", () => {
    const task = new UpgradeTask("a.py", "x = 1\n");
    expect(task.status).toBe("pending");
    expect(task.attempts).toBe(0);
    expect(task.currentContent).toBe("x = 1\n");
    expect(task.finalContent).toBe("x = 1\n");
    expect(task.history).toEqual([]);
    expect(task.done).toBe(false);
  });

  it("counts attempts on every draft", () => {
    const task = new UpgradeTask("a.py", "");
    expect(task.beginDraft()).toBe(1);
    task.transition("validating");
    task.recordFailure(failedResult(), "candidate 1");
    expect(task.beginDraft()).toBe(2);
  });

  it("records a diagnostic entry and seeds the next draft with the failing candidate", () => {
    const task = new UpgradeTask("a.py", "original");
    task.beginDraft();
    task.transition("validating");

    const entry = task.recordFailure(failedResult({ stdout: "epoch 1", exitCode: 2 }), "candidate 1");

    expect(entry).toEqual({
      attempt: 1,
      stage: "runtime",
      reason: "Runtime command exited with status 1 (runtime config test)",
      stdout: "epoch 1",
      stderr: "Traceback (most recent call last):\nValueError: boom",
      exitCode: 2,
      timedOut: false,
    });
    expect(task.history).toHaveLength(1);
    expect(task.currentContent).toBe("candidate 1");
    expect(task.finalContent).toBe("original");
  });

  it("moves to passed with the passing candidate", () => {
    const task = new UpgradeTask("a.py", "original");
    task.beginDraft();
    task.transition("validating");
    task.pass(passedResult({ stage: "runtime" }), "upgraded");

    expect(task.status).toBe("passed");
    expect(task.finalContent).toBe("upgraded");
    expect(task.done).toBe(true);
  });

  it("records the failure cause and error", () => {
    const task = new UpgradeTask("a.py", "original");
    const error = new CollaboratorError("auth", "bad key");
    task.beginDraft();
    task.fail("collaborator", error.message, "original", error);

    expect(task.status).toBe("failed");
    expect(task.failureCause).toBe("collaborator");
    expect(task.failureMessage).toBe("bad key");
    expect(task.failureError).toBe(error);
  });

  it("allows failing straight from pending", () => {
    const task = new UpgradeTask("a.py", "");
    task.fail("io", "unreadable", "");
    expect(task.status).toBe("failed");
  });

  it.each([
    ["pending", "validating"],
    ["pending", "passed"],
    ["drafting", "passed"],
    ["drafting", "drafting"],
  ] as const)("rejects %s → %s", (from, to) => {
    const task = new UpgradeTask("a.py", "");
    if (from === "drafting") task.beginDraft();
    expect(() => task.transition(to)).toThrow(InvalidTransitionError);
  });

  it("is frozen once done", () => {
    const task = new UpgradeTask("a.py", "");
    task.beginDraft();
    task.transition("validating");
    task.pass(passedResult({ stage: "syntax" }), "x");

    expect(() => task.beginDraft()).toThrow("Invalid task transition: passed → drafting");
    expect(() => task.recordFailure(failedResult(), "y")).toThrow("Task for a.py is already passed");
    expect(Object.isFrozen(task.history)).toBe(true);
  });
});

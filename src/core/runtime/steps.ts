import type { StepLog } from "../types.js";
import { truncateTail } from "../../utils/text.js";
import type { ProcessResult } from "./process-runner.js";

/** Record a finished process as a step, each stream cut to its last `maxLogChars`. */
export function toStepLog(label: string, result: ProcessResult, maxLogChars: number): StepLog {
  const stderrText = result.error ? joinNonEmpty(result.stderr, result.error) : result.stderr;
  const stdout = truncateTail(result.stdout, maxLogChars);
  const stderr = truncateTail(stderrText, maxLogChars);
  return {
    label,
    command: result.command,
    exitCode: result.exitCode,
    timedOut: result.timedOut,
    stdout: stdout.text,
    stderr: stderr.text,
    truncated:
      stdout.truncated ||
      stderr.truncated ||
      result.stdoutLength > result.stdout.length ||
      result.stderrLength > result.stderr.length,
    durationMs: result.durationMs,
  };
}

/** A step that ran nothing, kept so the log explains what was skipped. */
export function skippedStep(label: string, note: string): StepLog {
  return {
    label,
    command: "skip",
    exitCode: 0,
    timedOut: false,
    stdout: note,
    stderr: "",
    truncated: false,
    durationMs: 0,
  };
}

export function succeeded(result: ProcessResult): boolean {
  return result.exitCode === 0 && !result.timedOut && !result.aborted && result.error === undefined;
}

function joinNonEmpty(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join("\n");
}

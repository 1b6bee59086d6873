/**
 * Core types for the validate-repair pipeline
 */

/** A command as written in configuration: a shell line or an argv array. */
export type CommandSpec = string | string[];

export type ValidationStage = "syntax" | "runtime";

/** Log of one process the harness (or a syntax checker) ran. */
export interface StepLog {
  /** What the step was for, e.g. "setup", "main", "install" */
  label: string;
  /** Printable form of the command */
  command: string;
  exitCode: number | null;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  truncated: boolean;
  durationMs: number;
}

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
}

export interface ValidationResult {
  passed: boolean;
  stage: ValidationStage;
  /** One-line summary of why the stage failed (or "ok") */
  reason: string;
  stdout: string;
  stderr: string;
  /** True iff stdout or stderr was cut to the log limit */
  truncated: boolean;
  exitCode: number | null;
  timedOut: boolean;
  steps: StepLog[];
  /** Set for syntax failures */
  location?: SourceLocation;
}

/** Feedback recorded after a failed attempt and replayed to the collaborator. */
export interface DiagnosticEntry {
  attempt: number;
  stage: ValidationStage;
  reason: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

export type TaskStatus = "pending" | "drafting" | "validating" | "passed" | "failed";

export type FailureCause = "validation_exhausted" | "collaborator" | "io" | "aborted";

export type FailurePolicy = "revert_to_original" | "keep_last_candidate";

/** A candidate file handed to the validator. */
export interface CandidateFile {
  /** POSIX path relative to the repository root */
  relativePath: string;
  /** Absolute path on disk */
  absolutePath: string;
  content: string;
}

export interface PassedResultInit {
  stage: ValidationStage;
  steps?: StepLog[];
  stdout?: string;
  stderr?: string;
  truncated?: boolean;
  exitCode?: number | null;
}

export function passedResult(init: PassedResultInit): ValidationResult {
  return {
    passed: true,
    stage: init.stage,
    reason: "ok",
    stdout: init.stdout ?? "",
    stderr: init.stderr ?? "",
    truncated: init.truncated ?? false,
    exitCode: init.exitCode ?? (init.stage === "runtime" ? 0 : null),
    timedOut: false,
    steps: init.steps ?? [],
  };
}

/** Render a diagnostic entry as the text a human or collaborator reads. */
export function formatDiagnostic(entry: DiagnosticEntry): string {
  const lines = [`Attempt ${entry.attempt} failed at ${entry.stage} validation: ${entry.reason}`];
  if (entry.timedOut) {
    lines.push("The process timed out and was killed.");
  } else if (entry.exitCode !== null) {
    lines.push(`Exit code: ${entry.exitCode}`);
  }
  if (entry.stdout.trim()) {
    lines.push("stdout:", entry.stdout.trimEnd());
  }
  if (entry.stderr.trim()) {
    lines.push("stderr:", entry.stderr.trimEnd());
  }
  return lines.join("\n");
}

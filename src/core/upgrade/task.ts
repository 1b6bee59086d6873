/**
 * Per-file upgrade task and its state machine.
 *
 *   pending → drafting → validating → passed
 *                 ↑          │
 *                 └──────────┤ (retry)
 *                            ↓
 *                          failed
 *
 * drafting → failed and pending → failed cover collaborator, IO and abort
 * failures. A task is frozen once it reaches passed or failed.
 */
import type { UpgradeError } from "../errors.js";
import type { DiagnosticEntry, FailureCause, TaskStatus, ValidationResult } from "../types.js";

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["drafting", "failed"],
  drafting: ["validating", "failed"],
  validating: ["passed", "drafting", "failed"],
  passed: [],
  failed: [],
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: TaskStatus,
    readonly to: TaskStatus
  ) {
    super(`Invalid task transition: ${from} → ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class UpgradeTask {
  private _status: TaskStatus = "pending";
  private _attempts = 0;
  private _currentContent: string;
  private _finalContent: string;
  private readonly _history: DiagnosticEntry[] = [];
  private _lastResult: ValidationResult | null = null;
  private _failureCause: FailureCause | null = null;
  private _failureMessage: string | null = null;
  private _failureError: UpgradeError | null = null;

  constructor(
    readonly filePath: string,
    readonly originalContent: string,
    /** Bytes the original was decoded from, restored verbatim on revert */
    readonly originalBytes: Uint8Array | null = null
  ) {
    this._currentContent = originalContent;
    this._finalContent = originalContent;
  }

  get status(): TaskStatus {
    return this._status;
  }

  get attempts(): number {
    return this._attempts;
  }

  /** What the next draft starts from */
  get currentContent(): string {
    return this._currentContent;
  }

  /** What the file holds once the task is done */
  get finalContent(): string {
    return this._finalContent;
  }

  get history(): readonly DiagnosticEntry[] {
    return this._history;
  }

  get lastResult(): ValidationResult | null {
    return this._lastResult;
  }

  get failureCause(): FailureCause | null {
    return this._failureCause;
  }

  get failureMessage(): string | null {
    return this._failureMessage;
  }

  /** The error that ended the task, for causes other than validation_exhausted */
  get failureError(): UpgradeError | null {
    return this._failureError;
  }

  get done(): boolean {
    return this._status === "passed" || this._status === "failed";
  }

  transition(next: TaskStatus): void {
    if (!TRANSITIONS[this._status].includes(next)) {
      throw new InvalidTransitionError(this._status, next);
    }
    this._status = next;
  }

  /** Enter drafting for a new attempt. */
  beginDraft(): number {
    this.transition("drafting");
    this._attempts++;
    return this._attempts;
  }

  /** Record a failed validation; the failing candidate seeds the next draft. */
  recordFailure(result: ValidationResult, candidate: string): DiagnosticEntry {
    this.assertActive();
    const entry: DiagnosticEntry = {
      attempt: this._attempts,
      stage: result.stage,
      reason: result.reason,
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    };
    this._history.push(entry);
    this._lastResult = result;
    this._currentContent = candidate;
    return entry;
  }

  pass(result: ValidationResult, candidate: string): void {
    this.transition("passed");
    this._lastResult = result;
    this._finalContent = candidate;
    this.freeze();
  }

  fail(cause: FailureCause, message: string, finalContent: string, error: UpgradeError | null = null): void {
    this.transition("failed");
    this._failureCause = cause;
    this._failureMessage = message;
    this._failureError = error;
    this._finalContent = finalContent;
    this.freeze();
  }

  private assertActive(): void {
    if (this.done) {
      throw new Error(`Task for ${this.filePath} is already ${this._status}`);
    }
  }

  private freeze(): void {
    Object.freeze(this._history);
  }
}

/**
 * Per-file upgrade engine: drives one UpgradeTask through draft/validate
 * cycles until a candidate passes or the retry budget is spent.
 */
import type { Logger } from "../../utils/logger.js";
import type { Collaborator } from "../collaborator/collaborator.js";
import {
  CollaboratorError,
  RunAbortedError,
  UpgradeError,
  WorkspaceIOError,
  classifyCollaboratorError,
  errorMessage,
} from "../errors.js";
import type { FailureCause, FailurePolicy, ValidationResult } from "../types.js";
import type { ValidationPipeline } from "../validation/pipeline.js";
import { UpgradeTask } from "./task.js";
import type { SourceFile, WorkingTree } from "./working-tree.js";

export interface UpgradeEngineOptions {
  /** Retries after the first attempt; a task gets at most maxRetries + 1 drafts */
  maxRetries: number;
  failurePolicy: FailurePolicy;
}

export class UpgradeEngine {
  constructor(
    private readonly collaborator: Collaborator,
    private readonly pipeline: ValidationPipeline,
    private readonly tree: WorkingTree,
    private readonly logger: Logger,
    private readonly options: UpgradeEngineOptions
  ) {}

  async upgrade(filePath: string, signal?: AbortSignal): Promise<UpgradeTask> {
    let original: SourceFile;
    try {
      original = await this.tree.read(filePath);
    } catch (err) {
      const task = new UpgradeTask(filePath, "");
      const error = err instanceof WorkspaceIOError ? err : new WorkspaceIOError(filePath, errorMessage(err), { cause: err });
      this.logger.error({ error }, "Could not read file");
      task.fail("io", error.message, "", error);
      return task;
    }

    const task = new UpgradeTask(filePath, original.content, original.bytes);
    /** Last candidate successfully written to the tree */
    let written: string | null = null;

    for (;;) {
      const attempt = task.beginDraft();
      this.logger.info({ attempt, maxAttempts: this.options.maxRetries + 1 }, "Drafting candidate");

      let candidate: string;
      try {
        candidate = await this.collaborator.propose(
          { filePath, content: task.currentContent, history: [...task.history], attempt },
          signal
        );
      } catch (err) {
        const error = err instanceof RunAbortedError ? err : classifyCollaboratorError(err);
        return this.fail(task, error, written);
      }

      task.transition("validating");

      try {
        await this.tree.write(filePath, candidate);
        written = candidate;
      } catch (err) {
        return this.fail(task, asUpgradeError(filePath, err), written);
      }

      let result: ValidationResult;
      try {
        result = await this.pipeline.run([this.tree.candidate(filePath, candidate)], signal);
      } catch (err) {
        if (err instanceof RunAbortedError || err instanceof WorkspaceIOError) {
          return this.fail(task, err, written);
        }
        throw err;
      }

      if (result.passed) {
        task.pass(result, candidate);
        this.logger.info({ attempts: task.attempts }, "Candidate passed validation");
        return task;
      }

      const entry = task.recordFailure(result, candidate);
      this.logger.info(
        { attempt, stage: entry.stage, reason: entry.reason, timedOut: entry.timedOut },
        "Candidate failed validation"
      );

      if (task.attempts > this.options.maxRetries) {
        const message = `Validation failed after ${task.attempts} attempts: ${entry.reason}`;
        const finalContent = await this.settle(task, written);
        task.fail("validation_exhausted", message, finalContent);
        this.logger.warn({ attempts: task.attempts }, "Retry budget exhausted");
        return task;
      }
    }
  }

  private async fail(task: UpgradeTask, error: UpgradeError, written: string | null): Promise<UpgradeTask> {
    const cause = causeOf(error);
    const finalContent = await this.settle(task, written);
    task.fail(cause, error.message, finalContent, error);

    if (error instanceof CollaboratorError) {
      this.logger.error({ kind: error.kind, fatal: error.fatal, error: error.message }, "Collaborator failed");
    } else if (cause === "aborted") {
      this.logger.warn("Upgrade aborted");
    } else {
      this.logger.error({ error }, "Upgrade failed");
    }
    return task;
  }

  /**
   * Apply the failure policy and return what the file now holds.
   * Nothing is restored when no candidate was ever written.
   */
  private async settle(task: UpgradeTask, written: string | null): Promise<string> {
    if (written === null) return task.originalContent;
    if (this.options.failurePolicy === "keep_last_candidate") return written;

    try {
      await this.tree.write(task.filePath, task.originalBytes ?? task.originalContent);
      return task.originalContent;
    } catch (err) {
      this.logger.error({ error: err }, "Could not restore original content; last candidate left in place");
      return written;
    }
  }
}

function causeOf(error: UpgradeError): FailureCause {
  switch (error.code) {
    case "collaborator":
      return "collaborator";
    case "aborted":
      return "aborted";
    case "workspace_io":
    case "config":
      return "io";
  }
}

function asUpgradeError(filePath: string, err: unknown): UpgradeError {
  if (err instanceof UpgradeError) return err;
  return new WorkspaceIOError(filePath, errorMessage(err), { cause: err });
}

import { isAbsolute, join } from "node:path";
import type { Logger } from "../../utils/logger.js";
import { generateRunId } from "../../utils/id.js";
import type { Collaborator } from "../collaborator/collaborator.js";
import { withContext, withFileContext } from "../correlation.js";
import { CollaboratorError } from "../errors.js";
import { toReportEntry, writeMarkdownReport, type AbortInfo, type FileReportEntry, type RunReport } from "../report.js";
import { RuntimeEnvironment } from "../runtime/environment.js";
import { RuntimeHarness } from "../runtime/harness.js";
import type { ProcessExecutor } from "../runtime/process-runner.js";
import { describeCommand } from "../runtime/process-runner.js";
import { DEFAULT_MAX_LOG_CHARS, type RuntimeSettings } from "../runtime/runtime-config.js";
import type { FailurePolicy } from "../types.js";
import { ValidationPipeline } from "../validation/pipeline.js";
import {
  CompileCommandChecker,
  PythonSyntaxChecker,
  Validator,
  interpreterSyntaxCommand,
  type SyntaxChecker,
} from "../validation/validator.js";
import { discoverFiles } from "./discovery.js";
import { UpgradeEngine } from "./engine.js";
import type { UpgradeTask } from "./task.js";
import { WorkingTree } from "./working-tree.js";

export interface OrchestratorDeps {
  collaborator: Collaborator;
  executor: ProcessExecutor;
  logger: Logger;
}

export interface OrchestratorOptions {
  root: string;
  /** Null runs syntax-only */
  runtime: RuntimeSettings | null;
  maxRetries: number;
  failurePolicy: FailurePolicy;
  extensions: readonly string[];
  /** Relative to root; null writes no Markdown report */
  reportFile: string | null;
  /**
   * argv prefix of the interpreter-backed syntax check. Omitted, it compiles
   * with `python` (or the runtime's interpreter); null turns the check off.
   */
  compileCommand?: string[] | null;
  compileTimeoutSeconds?: number;
  /** Interpreter for the default syntax check */
  python?: string;
  runId?: string;
  now?: () => Date;
}

/**
 * Runs the upgrade engine over every eligible file of a repository, one
 * file at a time, and stops the queue on conditions fatal to the run.
 */
export class RepositoryOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async run(signal?: AbortSignal): Promise<RunReport> {
    const runId = this.options.runId ?? generateRunId();
    return withContext({ runId }, () => this.runInner(runId, signal));
  }

  private async runInner(runId: string, signal?: AbortSignal): Promise<RunReport> {
    const { logger } = this.deps;
    const startedAt = this.now().toISOString();
    const tree = new WorkingTree(this.options.root);
    const maxLogChars = this.options.runtime?.maxLogChars ?? DEFAULT_MAX_LOG_CHARS;

    const files = await discoverFiles(tree.root, {
      extensions: this.options.extensions,
      onUnreadable: (path, error) => logger.warn({ path, error }, "Skipping unreadable directory"),
    });
    logger.info({ root: tree.root, files: files.length, runtime: this.options.runtime !== null }, "Starting upgrade run");

    const engine = new UpgradeEngine(this.deps.collaborator, this.buildPipeline(maxLogChars), tree, logger, {
      maxRetries: this.options.maxRetries,
      failurePolicy: this.options.failurePolicy,
    });

    const entries: FileReportEntry[] = [];
    let aborted: AbortInfo | null = null;

    for (const [index, file] of files.entries()) {
      if (signal?.aborted) {
        aborted = { reason: "Run aborted by user", remaining: files.slice(index) };
        break;
      }

      const task = await withFileContext(file, () => engine.upgrade(file, signal));
      entries.push(toReportEntry(task, maxLogChars));

      const reason = fatalReason(task);
      if (reason) {
        aborted = { reason, remaining: files.slice(index + 1) };
        break;
      }
    }

    const report: RunReport = {
      runId,
      root: tree.root,
      startedAt,
      finishedAt: this.now().toISOString(),
      runtimeEnabled: this.options.runtime !== null,
      runtimeCommand: this.options.runtime ? describeCommand(this.options.runtime.command) : null,
      maxRetries: this.options.maxRetries,
      entries,
      aborted,
    };

    if (aborted) {
      logger.warn({ reason: aborted.reason, remaining: aborted.remaining.length }, "Run aborted");
    }
    logger.info(
      {
        passed: entries.filter((e) => e.status === "passed").length,
        failed: entries.filter((e) => e.status === "failed").length,
      },
      "Upgrade run finished"
    );

    if (this.options.reportFile) {
      const path = isAbsolute(this.options.reportFile)
        ? this.options.reportFile
        : join(tree.root, this.options.reportFile);
      await writeMarkdownReport(report, path);
      logger.info({ path }, "Report written");
    }

    return report;
  }

  private buildPipeline(maxLogChars: number): ValidationPipeline {
    const { executor, logger } = this.deps;
    const checkers: SyntaxChecker[] = [new PythonSyntaxChecker()];
    const compileCommand =
      this.options.compileCommand === undefined
        ? interpreterSyntaxCommand(this.options.python ?? this.options.runtime?.python ?? "python3")
        : this.options.compileCommand;
    if (compileCommand) {
      checkers.push(
        new CompileCommandChecker(
          {
            command: compileCommand,
            timeoutSeconds: this.options.compileTimeoutSeconds ?? 30,
            maxLogChars,
          },
          executor,
          logger
        )
      );
    }

    let harness: RuntimeHarness | null = null;
    if (this.options.runtime) {
      const environment = new RuntimeEnvironment(this.options.runtime, executor, logger);
      harness = new RuntimeHarness(this.options.runtime, environment, executor, logger);
    }

    return new ValidationPipeline(new Validator(checkers, logger, maxLogChars), harness, logger);
  }
}

function fatalReason(task: UpgradeTask): string | null {
  if (task.failureCause === "aborted") {
    return "Run aborted by user";
  }
  const error = task.failureError;
  if (error instanceof CollaboratorError && error.fatal) {
    return `Fatal collaborator error (${error.kind}): ${error.message}`;
  }
  return null;
}

/**
 * Validator: syntax stage of the pipeline. Runs every configured checker
 * against each candidate file and stops at the first issue. Never writes.
 */
import { dirname } from "node:path";
import type { Logger } from "../../utils/logger.js";
import { truncateTail } from "../../utils/text.js";
import { RunAbortedError } from "../errors.js";
import type { ProcessExecutor } from "../runtime/process-runner.js";
import { toStepLog } from "../runtime/steps.js";
import { passedResult, type CandidateFile, type StepLog, type ValidationResult } from "../types.js";
import { checkPythonSyntax, normalizeSource } from "./python-syntax.js";

export interface SyntaxFailure {
  message: string;
  line: number;
  column: number;
  /** Checker output, when the checker was an external process */
  output?: string;
  step?: StepLog;
}

export interface SyntaxChecker {
  readonly name: string;
  check(file: CandidateFile, signal?: AbortSignal): Promise<SyntaxFailure | null>;
}

export class PythonSyntaxChecker implements SyntaxChecker {
  readonly name = "python-syntax";

  async check(file: CandidateFile): Promise<SyntaxFailure | null> {
    return checkPythonSyntax(file.content);
  }
}

export interface CompileCommandCheckerOptions {
  /** argv prefix; the candidate's absolute path is appended */
  command: string[];
  timeoutSeconds: number;
  maxLogChars: number;
}

/**
 * Compiles the file with CPython's own parser without writing bytecode.
 * Prints only the exception line block on failure.
 */
const COMPILE_SNIPPET = [
  "import sys, traceback",
  "p = sys.argv[1]",
  "try:",
  "    compile(open(p, 'rb').read(), p, 'exec', dont_inherit=True)",
  "except (SyntaxError, ValueError) as e:",
  "    sys.stderr.write(''.join(traceback.format_exception_only(type(e), e)))",
  "    sys.exit(1)",
].join("\n");

/** argv that has `python` parse a file; the file path is appended by the checker. */
export function interpreterSyntaxCommand(python: string): string[] {
  return [python, "-c", COMPILE_SNIPPET];
}

/** Delegates to an external compiler such as `python -m py_compile`. */
export class CompileCommandChecker implements SyntaxChecker {
  readonly name = "compile-command";
  private unavailable = false;

  constructor(
    private readonly options: CompileCommandCheckerOptions,
    private readonly executor: ProcessExecutor,
    private readonly logger: Logger
  ) {}

  async check(file: CandidateFile, signal?: AbortSignal): Promise<SyntaxFailure | null> {
    if (this.unavailable) return null;

    const result = await this.executor.run({
      command: [...this.options.command, file.absolutePath],
      shell: false,
      cwd: dirname(file.absolutePath),
      timeoutMs: this.options.timeoutSeconds * 1000,
      signal,
    });

    if (result.aborted) {
      throw new RunAbortedError("Run aborted during syntax check");
    }
    if (result.error !== undefined) {
      this.unavailable = true;
      this.logger.warn({ command: result.command, error: result.error }, "Syntax check command could not be started; skipping it");
      return null;
    }

    const step = toStepLog("syntax_check", result, this.options.maxLogChars);
    if (result.timedOut) {
      return { message: `syntax check timed out after ${this.options.timeoutSeconds} seconds`, line: 1, column: 1, step };
    }
    if (result.exitCode === 0) return null;

    const output = `${result.stderr}\n${result.stdout}`;
    const lineMatch = /line (\d+)/.exec(output);
    return {
      message: (lastMeaningfulLine(result.stderr) ?? lastMeaningfulLine(result.stdout) ?? `exit status ${result.exitCode}`)
        .replace(/^(?:SyntaxError|IndentationError|TabError|ValueError):\s*/, ""),
      line: lineMatch?.[1] ? Number.parseInt(lineMatch[1], 10) : 1,
      column: 1,
      output: output.trim(),
      step,
    };
  }
}

export class Validator {
  constructor(
    private readonly checkers: SyntaxChecker[],
    private readonly logger: Logger,
    private readonly maxLogChars: number
  ) {}

  async validate(files: CandidateFile[], signal?: AbortSignal): Promise<ValidationResult> {
    for (const file of files) {
      for (const checker of this.checkers) {
        const failure = await checker.check(file, signal);
        if (!failure) continue;

        this.logger.debug(
          { checker: checker.name, file: file.relativePath, line: failure.line, message: failure.message },
          "Syntax check failed"
        );
        const report = failure.output ?? formatSyntaxError(file, failure);
        const stderr = truncateTail(report, this.maxLogChars);
        return {
          passed: false,
          stage: "syntax",
          reason: `SyntaxError: ${failure.message} (${file.relativePath}, line ${failure.line})`,
          stdout: "",
          stderr: stderr.text,
          truncated: stderr.truncated,
          exitCode: failure.step?.exitCode ?? null,
          timedOut: failure.step?.timedOut ?? false,
          steps: failure.step ? [failure.step] : [],
          location: { file: file.relativePath, line: failure.line, column: failure.column },
        };
      }
    }
    return passedResult({ stage: "syntax" });
  }
}

/** The interpreter-style report: location, offending line, caret, message. */
export function formatSyntaxError(file: CandidateFile, failure: SyntaxFailure): string {
  const lines = normalizeSource(file.content).split("\n");
  const sourceLine = lines[failure.line - 1];
  const out = [`  File "${file.relativePath}", line ${failure.line}`];
  if (sourceLine !== undefined && sourceLine.trim() !== "") {
    const indent = sourceLine.length - sourceLine.trimStart().length;
    out.push(`    ${sourceLine.trim()}`);
    out.push(`    ${" ".repeat(Math.max(0, failure.column - 1 - indent))}^`);
  }
  out.push(`SyntaxError: ${failure.message}`);
  return out.join("\n");
}

export function lastMeaningfulLine(text: string): string | null {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? null;
}

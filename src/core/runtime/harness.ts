/**
 * Runtime Harness: runs the project's configured command against the current
 * working tree inside the shared environment and reports a runtime-stage
 * ValidationResult.
 */
import type { Logger } from "../../utils/logger.js";
import { RunAbortedError } from "../errors.js";
import { passedResult, type StepLog, type ValidationResult } from "../types.js";
import { extractMissingModule, type PreparedEnvironment, type RuntimeEnvironment } from "./environment.js";
import type { ProcessExecutor, ProcessResult } from "./process-runner.js";
import type { PreparedCommand, RuntimeSettings } from "./runtime-config.js";
import { succeeded, toStepLog } from "./steps.js";

/** Output that means the program could not find an input artifact. */
export const MISSING_DATA_PATTERNS = ["FileNotFoundError", "No such file or directory", "[Errno 2]"];

export function mentionsMissingData(output: string): boolean {
  return MISSING_DATA_PATTERNS.some((pattern) => output.includes(pattern));
}

interface MainRun {
  result: ProcessResult;
  step: StepLog;
}

export class RuntimeHarness {
  constructor(
    private readonly settings: RuntimeSettings,
    private readonly environment: RuntimeEnvironment,
    private readonly executor: ProcessExecutor,
    private readonly logger: Logger
  ) {}

  async validate(signal?: AbortSignal): Promise<ValidationResult> {
    const prepared = await this.environment.prepare(signal);
    const steps: StepLog[] = [...prepared.steps];
    const env = this.environment.processEnv(prepared);

    const setupFailure = await this.runSetup(env, steps, signal);
    if (setupFailure) return setupFailure;

    let current = await this.runMain("runtime_command", env, steps, signal);
    let dataFallbackUsed = false;
    let moduleFallbackUsed = false;

    while (!succeeded(current.result) && !current.result.timedOut) {
      const output = `${current.result.stdout}\n${current.result.stderr}`;

      if (!dataFallbackUsed && mentionsMissingData(output)) {
        dataFallbackUsed = true;
        this.logger.info("Runtime command reported missing data; re-running setup commands");
        const retrySetupFailure = await this.runSetup(env, steps, signal);
        if (retrySetupFailure) return retrySetupFailure;
        current = await this.runMain("runtime_command_retry", env, steps, signal);
        continue;
      }

      const missingModule = extractMissingModule(current.result.stderr) ?? extractMissingModule(current.result.stdout);
      if (!moduleFallbackUsed && missingModule && prepared.installEnabled && prepared.installOk) {
        moduleFallbackUsed = true;
        this.logger.info({ module: missingModule }, "Runtime command is missing a module; installing it");
        const install = await this.environment.installPackage(missingModule, signal);
        steps.push(install.step);
        if (!install.ok) break;
        current = await this.runMain("runtime_command_retry", env, steps, signal);
        continue;
      }

      break;
    }

    if (succeeded(current.result)) {
      return passedResult({
        stage: "runtime",
        steps,
        stdout: current.step.stdout,
        stderr: current.step.stderr,
        truncated: current.step.truncated,
        exitCode: 0,
      });
    }

    return this.failure(this.mainFailureReason(current.result, prepared), current.step, steps);
  }

  private async runSetup(
    env: NodeJS.ProcessEnv,
    steps: StepLog[],
    signal?: AbortSignal
  ): Promise<ValidationResult | null> {
    for (const [index, setup] of this.settings.setupCommands.entries()) {
      const result = await this.exec(setup, env, signal);
      const step = toStepLog(`setup_command[${index}]`, result, this.settings.maxLogChars);
      steps.push(step);
      if (succeeded(result)) continue;

      const reason = result.timedOut
        ? `Setup command #${index + 1} timed out before runtime execution`
        : `Setup command #${index + 1} failed before runtime execution`;
      this.logger.debug({ command: result.command, exitCode: result.exitCode }, reason);
      return this.failure(reason, step, steps);
    }
    return null;
  }

  private async runMain(
    label: string,
    env: NodeJS.ProcessEnv,
    steps: StepLog[],
    signal?: AbortSignal
  ): Promise<MainRun> {
    const result = await this.exec(this.settings, env, signal);
    const step = toStepLog(label, result, this.settings.maxLogChars);
    steps.push(step);
    this.logger.debug(
      { command: result.command, exitCode: result.exitCode, timedOut: result.timedOut, durationMs: result.durationMs },
      "Runtime command finished"
    );
    return { result, step };
  }

  private async exec(
    command: PreparedCommand,
    env: NodeJS.ProcessEnv,
    signal?: AbortSignal
  ): Promise<ProcessResult> {
    const result = await this.executor.run({
      command: command.command,
      shell: command.shell,
      cwd: this.settings.cwd,
      env,
      timeoutMs: this.settings.timeoutSeconds * 1000,
      signal,
    });
    if (result.aborted) {
      throw new RunAbortedError("Run aborted during runtime validation");
    }
    return result;
  }

  private mainFailureReason(result: ProcessResult, prepared: PreparedEnvironment): string {
    const source = ` (${this.settings.commandSource})`;
    let reason: string;
    if (result.timedOut) {
      reason = `Runtime command timed out after ${this.settings.timeoutSeconds} seconds${source}`;
    } else if (result.error !== undefined) {
      reason = `Runtime command could not be started: ${result.error}${source}`;
    } else if (result.exitCode !== null) {
      reason = `Runtime command exited with status ${result.exitCode}${source}`;
    } else {
      reason = `Runtime command was terminated by ${result.signal ?? "a signal"}${source}`;
    }
    if (prepared.installFailure) {
      reason += `; ${prepared.installFailure}`;
    }
    return reason;
  }

  private failure(reason: string, step: StepLog, steps: StepLog[]): ValidationResult {
    return {
      passed: false,
      stage: "runtime",
      reason,
      stdout: step.stdout,
      stderr: step.stderr,
      truncated: step.truncated,
      exitCode: step.exitCode,
      timedOut: step.timedOut,
      steps,
    };
  }
}

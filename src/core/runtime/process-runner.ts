/**
 * Child process execution with a wall-clock timeout and process-group kill.
 *
 * Every command runs as the leader of its own process group (detached), so
 * a timeout or an abort takes down the whole tree: a shell, the interpreter
 * it started, and anything that interpreter forked.
 */
import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import type { CommandSpec } from "../types.js";

export interface ProcessRequest {
  command: CommandSpec;
  shell: boolean;
  cwd: string;
  /** Full environment for the child; defaults to the current process env */
  env?: NodeJS.ProcessEnv;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ProcessResult {
  /** Printable form of the command */
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** Characters written to each stream, including any dropped from capture */
  stdoutLength: number;
  stderrLength: number;
  timedOut: boolean;
  aborted: boolean;
  /** Spawn failure (missing executable, bad cwd, ...) */
  error?: string;
  durationMs: number;
}

/** Seam for tests: the harness and syntax checker only see this interface. */
export interface ProcessExecutor {
  run(request: ProcessRequest): Promise<ProcessResult>;
}

export interface ChildProcessExecutorOptions {
  /** Upper bound on characters kept per stream; the tail is kept */
  maxCaptureChars?: number;
  /** How long to wait for `close` after a kill before giving up on the streams */
  killGraceMs?: number;
}

const DEFAULT_MAX_CAPTURE_CHARS = 1_000_000;
const DEFAULT_KILL_GRACE_MS = 2_000;

export class ChildProcessExecutor implements ProcessExecutor {
  private readonly maxCaptureChars: number;
  private readonly killGraceMs: number;

  constructor(options: ChildProcessExecutorOptions = {}) {
    this.maxCaptureChars = options.maxCaptureChars ?? DEFAULT_MAX_CAPTURE_CHARS;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  run(request: ProcessRequest): Promise<ProcessResult> {
    const display = describeCommand(request.command);
    const started = Date.now();
    const stdout = new TailBuffer(this.maxCaptureChars);
    const stderr = new TailBuffer(this.maxCaptureChars);

    const finish = (
      fields: Pick<ProcessResult, "exitCode" | "signal" | "timedOut" | "aborted"> & { error?: string }
    ): ProcessResult => ({
      command: display,
      stdout: stdout.toString(),
      stderr: stderr.toString(),
      stdoutLength: stdout.total,
      stderrLength: stderr.total,
      durationMs: Date.now() - started,
      ...fields,
    });

    if (request.signal?.aborted) {
      return Promise.resolve(finish({ exitCode: null, signal: null, timedOut: false, aborted: true }));
    }

    let child: ChildProcess;
    try {
      child = spawnCommand(request);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return Promise.resolve(
        finish({ exitCode: null, signal: null, timedOut: false, aborted: false, error: message })
      );
    }

    return new Promise<ProcessResult>((resolve) => {
      let settled = false;
      let timedOut = false;
      let aborted = false;
      let graceTimer: NodeJS.Timeout | undefined;

      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: string) => stderr.push(chunk));

      const settle = (result: ProcessResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (graceTimer) clearTimeout(graceTimer);
        request.signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      const terminate = (): void => {
        killProcessTree(child);
        // A descendant that left the group can hold the pipes open forever.
        graceTimer = setTimeout(() => {
          child.stdout?.destroy();
          child.stderr?.destroy();
          settle(finish({ exitCode: null, signal: "SIGKILL", timedOut, aborted }));
        }, this.killGraceMs);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, Math.max(1, request.timeoutMs));

      const onAbort = (): void => {
        aborted = true;
        terminate();
      };
      request.signal?.addEventListener("abort", onAbort, { once: true });

      child.on("error", (err) => {
        settle(finish({ exitCode: null, signal: null, timedOut, aborted, error: err.message }));
      });

      child.on("close", (code, signal) => {
        settle(finish({ exitCode: code, signal, timedOut, aborted }));
      });
    });
  }
}

function spawnCommand(request: ProcessRequest): ChildProcess {
  const options: SpawnOptions = {
    cwd: request.cwd,
    env: request.env ?? process.env,
    detached: process.platform !== "win32",
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  };

  if (request.shell) {
    const line = typeof request.command === "string" ? request.command : toShellLine(request.command);
    return spawn(line, { ...options, shell: true });
  }

  if (typeof request.command === "string") {
    return spawn(request.command, [], options);
  }

  const [program, ...args] = request.command;
  if (program === undefined || program === "") {
    throw new Error("Empty command");
  }
  return spawn(program, args, options);
}

/** Kill the child's whole process group, falling back to the child alone. */
export function killProcessTree(child: ChildProcess): void {
  if (child.pid === undefined) return;
  // The leader may have exited while the rest of its group lives on.
  if (process.platform !== "win32") {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch (err) {
      // ESRCH: the group is already gone
      if (isErrno(err) && err.code === "ESRCH") return;
    }
  }
  if (child.exitCode === null) child.kill("SIGKILL");
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

const SAFE_SHELL_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** POSIX shell quoting for one argument. */
export function quoteShellArg(arg: string): string {
  if (arg === "") return "''";
  if (SAFE_SHELL_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

export function toShellLine(argv: readonly string[]): string {
  return argv.map(quoteShellArg).join(" ");
}

export function describeCommand(command: CommandSpec): string {
  return typeof command === "string" ? command : toShellLine(command);
}

/** Keeps the last `limit` characters written to a stream. */
class TailBuffer {
  private chunks: string[] = [];
  private kept = 0;
  total = 0;

  constructor(private readonly limit: number) {}

  push(chunk: string): void {
    this.chunks.push(chunk);
    this.kept += chunk.length;
    this.total += chunk.length;
    let head = this.chunks[0];
    while (head !== undefined && this.chunks.length > 1 && this.kept - head.length >= this.limit) {
      this.chunks.shift();
      this.kept -= head.length;
      head = this.chunks[0];
    }
  }

  toString(): string {
    const text = this.chunks.join("");
    return text.length > this.limit ? text.slice(text.length - this.limit) : text;
  }
}

/**
 * The isolated Python environment shared by every file and retry in a run.
 *
 * One handle per run, created by the orchestrator and passed to the harness.
 * Preparation is memoised, and every operation that mutates the virtualenv
 * goes through one promise chain so installs never overlap.
 */
import { createHash } from "node:crypto";
import { readFile, rm, stat, writeFile } from "node:fs/promises";
import { delimiter, dirname, isAbsolute, join, relative, resolve } from "node:path";
import type { Logger } from "../../utils/logger.js";
import { RunAbortedError } from "../errors.js";
import type { StepLog } from "../types.js";
import type { ProcessExecutor, ProcessRequest, ProcessResult } from "./process-runner.js";
import type { RuntimeSettings } from "./runtime-config.js";
import { skippedStep, succeeded, toStepLog } from "./steps.js";

export const MARKER_FILENAME = "ml_upgrader_marker.json";
export const DEFAULT_VENV_DIRS = [".venv", ".ml_upgrader_venv"];

const DEFAULT_INSTALL_TIMEOUT_MS = 15 * 60 * 1000;

export interface PreparedEnvironment {
  /** Null when no virtualenv is in use (skip_install without an existing one) */
  venvPath: string | null;
  binDir: string | null;
  pythonPath: string | null;
  /** Whether installs are allowed at all */
  installEnabled: boolean;
  /** False when venv creation or any install step failed */
  installOk: boolean;
  /** Short description of the install failure, if any */
  installFailure: string | null;
  steps: StepLog[];
}

export interface ModuleInstallResult {
  ok: boolean;
  step: StepLog;
}

export interface RuntimeEnvironmentOptions {
  installTimeoutMs?: number;
}

interface InstallMarker {
  requirements_hashes: Record<string, string>;
  editable_installed: boolean;
}

export class RuntimeEnvironment {
  private preparation: Promise<PreparedEnvironment> | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly installTimeoutMs: number;

  constructor(
    private readonly settings: RuntimeSettings,
    private readonly executor: ProcessExecutor,
    private readonly logger: Logger,
    options: RuntimeEnvironmentOptions = {}
  ) {
    this.installTimeoutMs = options.installTimeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS;
  }

  /** Prepare the environment once; later calls share the first result. */
  prepare(signal?: AbortSignal): Promise<PreparedEnvironment> {
    if (!this.preparation) {
      this.preparation = this.serialize(() => this.doPrepare(signal));
    }
    return this.preparation;
  }

  /** Install a single package into the shared virtualenv. */
  async installPackage(name: string, signal?: AbortSignal): Promise<ModuleInstallResult> {
    const prepared = await this.prepare(signal);
    return this.serialize(async () => {
      if (!prepared.pythonPath) {
        return {
          ok: false,
          step: skippedStep(`auto_install:${name}`, "No virtual environment available for installation"),
        };
      }
      const result = await this.runInstall([prepared.pythonPath, "-m", "pip", "install", name], signal);
      const step = toStepLog(`auto_install:${name}`, result, this.settings.maxLogChars);
      this.logger.info({ package: name, ok: succeeded(result) }, "Installed missing module");
      return { ok: succeeded(result), step };
    });
  }

  /** Environment for setup and main commands: process env, venv, then user overrides. */
  processEnv(prepared: PreparedEnvironment, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...base };
    env.PYTHONPATH = prependPath(this.settings.projectRoot, base.PYTHONPATH);
    if (prepared.venvPath && prepared.binDir) {
      env.VIRTUAL_ENV = prepared.venvPath;
      env.PATH = prependPath(prepared.binDir, base.PATH);
    }
    return { ...env, ...this.settings.env };
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn, fn);
    this.queue = next.catch((err: unknown) => {
      this.logger.debug({ error: err }, "Environment operation failed");
    });
    return next;
  }

  private async doPrepare(signal?: AbortSignal): Promise<PreparedEnvironment> {
    const venvPath = this.settings.venvPath ?? (await selectVenvPath(this.settings.projectRoot));
    const paths = venvPaths(venvPath);
    const steps: StepLog[] = [];

    if (this.settings.skipInstall) {
      const existing = await isFile(paths.python);
      steps.push(skippedStep("dependency_install", "Dependency installation skipped by configuration"));
      this.logger.info({ venvPath: existing ? venvPath : null }, "Runtime environment ready (install skipped)");
      return {
        venvPath: existing ? venvPath : null,
        binDir: existing ? paths.bin : null,
        pythonPath: existing ? paths.python : null,
        installEnabled: false,
        installOk: true,
        installFailure: null,
        steps,
      };
    }

    if (this.settings.forceReinstall) {
      this.logger.info({ venvPath }, "Removing virtual environment for forced reinstall");
      await rm(venvPath, { recursive: true, force: true });
    }

    if (!(await isFile(paths.python))) {
      const result = await this.runInstall([this.settings.python, "-m", "venv", venvPath], signal);
      steps.push(toStepLog("create_virtualenv", result, this.settings.maxLogChars));
      if (!succeeded(result)) {
        const failure = result.timedOut
          ? "Virtual environment creation timed out"
          : "Failed to create virtual environment";
        this.logger.warn({ venvPath, exitCode: result.exitCode }, failure);
        return {
          venvPath: null,
          binDir: null,
          pythonPath: null,
          installEnabled: true,
          installOk: false,
          installFailure: failure,
          steps,
        };
      }
    }

    const installOk = await this.ensureDependencies(venvPath, paths.python, steps, signal);
    this.logger.info({ venvPath, installOk }, "Runtime environment prepared");

    return {
      venvPath,
      binDir: paths.bin,
      pythonPath: paths.python,
      installEnabled: true,
      installOk,
      installFailure: installOk ? null : "Dependency installation failed",
      steps,
    };
  }

  private async ensureDependencies(
    venvPath: string,
    python: string,
    steps: StepLog[],
    signal?: AbortSignal
  ): Promise<boolean> {
    const root = this.settings.projectRoot;
    const markerPath = join(venvPath, MARKER_FILENAME);
    const marker = await loadMarker(markerPath);

    const requirementFiles = await discoverRequirementFiles(this.settings);
    const hashes: Record<string, string> = {};
    for (const file of requirementFiles) {
      hashes[file] = await hashFile(file);
    }

    const force = this.settings.forceReinstall;
    const installNeeded = force || !sameHashes(hashes, marker?.requirements_hashes ?? {});
    const editableSources = (await isFile(join(root, "setup.py"))) || (await isFile(join(root, "pyproject.toml")));
    const editableInstalled = marker?.editable_installed ?? false;
    const runEditable = editableSources && (force || !editableInstalled);

    if (!installNeeded && !runEditable) {
      steps.push(skippedStep("dependency_install", "Dependencies already up to date"));
      return true;
    }

    const toolchain = await this.runInstall(
      [python, "-m", "pip", "install", "--upgrade", "pip", "setuptools", "wheel"],
      signal
    );
    steps.push(toStepLog("upgrade_toolchain", toolchain, this.settings.maxLogChars));
    if (!succeeded(toolchain)) return false;

    let ok = true;
    if (installNeeded && requirementFiles.length === 0) {
      steps.push(skippedStep("dependency_install", "No requirements files discovered"));
    }
    if (installNeeded) {
      for (const file of requirementFiles) {
        const result = await this.runInstall([python, "-m", "pip", "install", "-r", file], signal, dirname(file));
        steps.push(toStepLog(`dependency_install:${relative(root, file)}`, result, this.settings.maxLogChars));
        if (succeeded(result)) continue;
        if (result.timedOut) {
          ok = false;
          break;
        }

        const fallback = extractMissingDistribution(result.stderr);
        if (!fallback) {
          ok = false;
          break;
        }
        const single = await this.runInstall([python, "-m", "pip", "install", fallback], signal);
        steps.push(toStepLog(`dependency_fallback:${fallback}`, single, this.settings.maxLogChars));
        if (!succeeded(single)) {
          ok = false;
          break;
        }
      }
    }

    if (ok && runEditable) {
      const editable = await this.runInstall([python, "-m", "pip", "install", "-e", root], signal);
      steps.push(toStepLog("editable_install", editable, this.settings.maxLogChars));
      ok = succeeded(editable);
    }

    if (ok) {
      try {
        await saveMarker(markerPath, {
          requirements_hashes: hashes,
          editable_installed: runEditable || editableInstalled,
        });
      } catch (err) {
        this.logger.warn({ error: err, markerPath }, "Could not write install marker");
      }
    }
    return ok;
  }

  private async runInstall(argv: string[], signal?: AbortSignal, cwd?: string): Promise<ProcessResult> {
    const request: ProcessRequest = {
      command: argv,
      shell: false,
      cwd: cwd ?? this.settings.projectRoot,
      timeoutMs: this.installTimeoutMs,
      signal,
    };
    this.logger.debug({ command: argv }, "Running install step");
    const result = await this.executor.run(request);
    if (result.aborted) {
      throw new RunAbortedError("Run aborted during environment preparation");
    }
    return result;
  }
}

export function venvPaths(venvPath: string): { bin: string; python: string } {
  const bin = process.platform === "win32" ? join(venvPath, "Scripts") : join(venvPath, "bin");
  const python = join(bin, process.platform === "win32" ? "python.exe" : "python");
  return { bin, python };
}

/** An existing `.venv` or `.ml_upgrader_venv` wins; otherwise `.venv` is created. */
export async function selectVenvPath(projectRoot: string): Promise<string> {
  const candidates = DEFAULT_VENV_DIRS.map((name) => join(projectRoot, name));
  for (const candidate of candidates) {
    if ((await isFile(venvPaths(candidate).python)) || (await isDirectory(candidate))) {
      return candidate;
    }
  }
  return join(projectRoot, DEFAULT_VENV_DIRS[0] ?? ".venv");
}

/**
 * requirements.txt in the project root, the runtime cwd, and beside the main
 * script when the command is `python path/to/script.py`.
 */
export async function discoverRequirementFiles(settings: RuntimeSettings): Promise<string[]> {
  const found: string[] = [];
  const add = async (path: string): Promise<void> => {
    const absolute = resolve(path);
    if (!found.includes(absolute) && (await isFile(absolute))) {
      found.push(absolute);
    }
  };

  await add(join(settings.projectRoot, "requirements.txt"));
  if (settings.cwd !== settings.projectRoot) {
    await add(join(settings.cwd, "requirements.txt"));
  }

  const script = mainScriptPath(settings);
  if (script) {
    await add(join(dirname(isAbsolute(script) ? script : join(settings.cwd, script)), "requirements.txt"));
  }
  return found;
}

/** The `.py` argument of an argv command, unless it runs a module with -m. */
export function mainScriptPath(settings: Pick<RuntimeSettings, "command">): string | null {
  if (typeof settings.command === "string") return null;
  for (const part of settings.command.slice(1)) {
    if (part === "-m") return null;
    if (part.startsWith("-")) continue;
    return part.endsWith(".py") ? part : null;
  }
  return null;
}

const MISSING_DISTRIBUTION = /No matching distribution found for ([A-Za-z0-9_.-]+)/;

export function extractMissingDistribution(output: string): string | null {
  const match = MISSING_DISTRIBUTION.exec(output);
  const spec = match?.[1];
  if (!spec) return null;
  const name = spec.split(/[<>=!~]/, 1)[0]?.trim();
  return name ? name : null;
}

const MISSING_MODULE = /No module named ['"]([A-Za-z0-9_.-]+)['"]/;

/** Top-level package of a `No module named 'x.y'` error; private modules are ignored. */
export function extractMissingModule(output: string): string | null {
  const match = MISSING_MODULE.exec(output);
  const module = match?.[1];
  if (!module || module.startsWith("_")) return null;
  return module.split(".")[0] ?? null;
}

function prependPath(value: string, existing: string | undefined): string {
  return existing ? `${value}${delimiter}${existing}` : value;
}

function sameHashes(a: Record<string, string>, b: Record<string, string>): boolean {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  return keysA.length === keysB.length && keysA.every((key) => a[key] === b[key]);
}

async function hashFile(path: string): Promise<string> {
  return createHash("sha256").update(await readFile(path)).digest("hex");
}

async function loadMarker(path: string): Promise<InstallMarker | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch {
    return null;
  }
  if (typeof raw !== "object" || raw === null) return null;

  const hashes: Record<string, string> = {};
  if ("requirements_hashes" in raw && typeof raw.requirements_hashes === "object" && raw.requirements_hashes !== null) {
    for (const [key, value] of Object.entries(raw.requirements_hashes)) {
      if (typeof value === "string") hashes[key] = value;
    }
  }
  const editable = "editable_installed" in raw && raw.editable_installed === true;
  return { requirements_hashes: hashes, editable_installed: editable };
}

async function saveMarker(path: string, marker: InstallMarker): Promise<void> {
  await writeFile(path, JSON.stringify(marker, null, 2), "utf-8");
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

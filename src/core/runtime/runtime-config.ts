/**
 * Runtime validation settings: a JSON file in the project root plus
 * ML_UPGRADER_* environment overrides, resolved into RuntimeSettings.
 *
 * No command anywhere means runtime validation is off and the loader
 * returns null.
 */
import type { Dirent } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import { basename, isAbsolute, join, relative, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { CommandSpec } from "../types.js";
import { EXCLUDED_DIRS } from "../upgrade/discovery.js";

export const RUNTIME_CONFIG_FILENAMES = ["ml_upgrader_runtime.json", join(".ml-upgrader", "runtime.json")];

export const DEFAULT_TIMEOUT_SECONDS = 120;
export const DEFAULT_MAX_LOG_CHARS = 6000;
export const MAX_LOG_CHARS_CEILING = 200_000;

export interface PreparedCommand {
  command: CommandSpec;
  shell: boolean;
}

export interface RuntimeSettings extends PreparedCommand {
  projectRoot: string;
  /** Where the command came from, for failure messages */
  commandSource: string;
  /** Absolute working directory for setup and main commands */
  cwd: string;
  timeoutSeconds: number;
  setupCommands: PreparedCommand[];
  skipInstall: boolean;
  forceReinstall: boolean;
  /** Overlaid on the process environment */
  env: Record<string, string>;
  maxLogChars: number;
  /** Explicit virtualenv location; null selects one under the project root */
  venvPath: string | null;
  /** Interpreter used to create the virtualenv */
  python: string;
  configPath: string | null;
  /** Set when the main command's script path was rewritten to one that exists */
  commandNote: string | null;
}

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off"]);

export function parseBool(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
    return null;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (TRUE_WORDS.has(normalized)) return true;
    if (FALSE_WORDS.has(normalized)) return false;
  }
  return null;
}

export function parseInteger(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

const BoolLike = z.union([z.boolean(), z.string(), z.number()]).transform((value, ctx) => {
  const parsed = parseBool(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a boolean" });
    return z.NEVER;
  }
  return parsed;
});

const IntLike = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = parseInteger(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be an integer" });
    return z.NEVER;
  }
  return parsed;
});

const CommandPart = z.union([z.string(), z.number().transform(String)]);

const CommandValue = z.union([
  z.string().trim().min(1, "cannot be empty"),
  z.number().transform(String),
  z.array(CommandPart).min(1, "list cannot be empty"),
]);

const SetupCommands = z.union([
  z.string().transform((text) =>
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  ),
  z.array(CommandValue),
  z.null().transform((): CommandSpec[] => []),
]).transform((commands): CommandSpec[] => commands);

const RuntimeConfigSchema = z.object({
  command: CommandValue.optional(),
  timeout: IntLike.optional(),
  setup_commands: SetupCommands.optional(),
  skip_install: BoolLike.optional(),
  force_reinstall: BoolLike.optional(),
  shell: BoolLike.optional(),
  cwd: z.string().optional(),
  working_dir: z.string().optional(),
  env: z
    .record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
    .transform((values) =>
      Object.fromEntries(Object.entries(values).map(([k, v]) => [k, v === null ? "" : String(v)]))
    )
    .optional(),
  max_log_chars: IntLike.optional(),
});

export type RuntimeConfigFile = z.infer<typeof RuntimeConfigSchema>;

interface LoadedConfigFile {
  path: string | null;
  config: RuntimeConfigFile;
}

/**
 * Resolve runtime settings for a project root.
 * Throws ConfigError for unreadable or malformed configuration.
 */
export async function loadRuntimeSettings(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<RuntimeSettings | null> {
  const root = resolve(projectRoot);
  const { path: configPath, config } = await loadRuntimeConfigFile(root, env);

  const envCommand = env.ML_UPGRADER_RUNTIME_COMMAND?.trim();
  const command: CommandSpec | undefined = envCommand ? envCommand : config.command;
  if (command === undefined) return null;

  const commandSource = envCommand
    ? "environment variable ML_UPGRADER_RUNTIME_COMMAND"
    : `runtime config ${configPath ?? "(unknown)"}`;

  const cwd = await resolveWorkingDirectory(root, config.cwd ?? config.working_dir, configPath);

  const timeoutSeconds = Math.max(
    1,
    envInteger(env, "ML_UPGRADER_RUNTIME_TIMEOUT") ?? config.timeout ?? DEFAULT_TIMEOUT_SECONDS
  );
  const maxLogChars = clamp(
    envInteger(env, "ML_UPGRADER_MAX_RUNTIME_LOG_CHARS") ?? config.max_log_chars ?? DEFAULT_MAX_LOG_CHARS,
    0,
    MAX_LOG_CHARS_CEILING
  );
  const skipInstall = envBool(env, "ML_UPGRADER_RUNTIME_SKIP_INSTALL") ?? config.skip_install ?? false;
  const forceReinstall = envBool(env, "ML_UPGRADER_FORCE_REINSTALL") ?? config.force_reinstall ?? false;

  const python = resolvePython(env);
  const prepared = prepareCommand(command, config.shell, "command");
  const adjustment =
    !prepared.shell && Array.isArray(prepared.command)
      ? await adjustScriptPath(prepared.command, cwd, root, python)
      : null;
  const main: PreparedCommand = adjustment ? { command: adjustment.command, shell: false } : prepared;
  const setupCommands = (config.setup_commands ?? []).map((setup, index) =>
    prepareCommand(setup, config.shell, `setup_commands[${index}]`)
  );

  const venvOverride = env.ML_UPGRADER_VENV_PATH?.trim();

  return {
    projectRoot: root,
    command: main.command,
    shell: main.shell,
    commandSource,
    cwd,
    timeoutSeconds,
    setupCommands,
    skipInstall,
    forceReinstall,
    env: config.env ?? {},
    maxLogChars,
    venvPath: venvOverride ? resolve(root, venvOverride) : null,
    python,
    configPath,
    commandNote: adjustment?.note ?? null,
  };
}

/** Base interpreter for venv creation and syntax checks. */
export function resolvePython(env: NodeJS.ProcessEnv): string {
  return env.ML_UPGRADER_PYTHON?.trim() || "python3";
}

export interface ScriptAdjustment {
  command: string[];
  note: string;
}

const PYTHON_NAME = /^python(\d+(\.\d+)?)?$/;

/**
 * `python path/to/script.py` whose script is not under `cwd` is pointed at
 * the same path under the project root, or else at the only file of that
 * name in the project. Module (`-m`) and inline (`-c`) runs are left alone.
 */
export async function adjustScriptPath(
  command: readonly string[],
  cwd: string,
  projectRoot: string,
  python: string
): Promise<ScriptAdjustment | null> {
  const executable = command[0];
  if (executable === undefined) return null;
  const name = basename(executable);
  if (!PYTHON_NAME.test(name) && name !== basename(python)) return null;

  let index = -1;
  for (let i = 1; i < command.length; i++) {
    const part = command[i] ?? "";
    if (part === "-m" || part === "-c") return null;
    if (part.startsWith("-")) continue;
    if (part.endsWith(".py")) index = i;
    break;
  }

  const script = index < 0 ? undefined : command[index];
  if (script === undefined || isAbsolute(script)) return null;
  if (await isFile(resolve(cwd, script))) return null;

  const underRoot = resolve(projectRoot, script);
  const found = (await isFile(underRoot)) ? underRoot : await findUniqueFile(projectRoot, basename(script));
  if (found === null) return null;

  const replacement = relative(cwd, found);
  if (replacement === script) return null;

  const adjusted = [...command];
  adjusted[index] = replacement;
  return {
    command: adjusted,
    note: `Runtime command script '${script}' not found in '${cwd}'. Using '${replacement}' instead.`,
  };
}

/** Absolute path of the one file named `filename`; null for none or several. */
async function findUniqueFile(root: string, filename: string): Promise<string | null> {
  const matches: string[] = [];
  const pending = [root];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      continue; // unreadable directories are not searched
    }
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!EXCLUDED_DIRS.has(entry.name) && !entry.name.startsWith(".")) pending.push(join(dir, entry.name));
      } else if (entry.isFile() && entry.name === filename) {
        matches.push(join(dir, entry.name));
        if (matches.length > 1) return null;
      }
    }
  }
  return matches[0] ?? null;
}

/**
 * A string defaults to running through the shell and an argv array to running
 * without one. An argv array under `shell: true` is quoted into one line later.
 */
export function prepareCommand(
  command: CommandSpec,
  shellPreference: boolean | undefined,
  field: string
): PreparedCommand {
  if (typeof command === "string") {
    if (shellPreference === false) {
      throw new ConfigError(`Runtime config field '${field}' is a string but 'shell' is false; use an argument array`);
    }
    return { command, shell: true };
  }
  return { command: [...command], shell: shellPreference ?? false };
}

async function loadRuntimeConfigFile(root: string, env: NodeJS.ProcessEnv): Promise<LoadedConfigFile> {
  const candidates: string[] = [];
  const explicit = env.ML_UPGRADER_RUNTIME_CONFIG?.trim();
  if (explicit) {
    candidates.push(isAbsolute(explicit) ? explicit : join(root, explicit));
  }
  for (const name of RUNTIME_CONFIG_FILENAMES) {
    candidates.push(join(root, name));
  }

  for (const path of new Set(candidates)) {
    if (!(await isFile(path))) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, "utf-8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Runtime config parse error in ${path}: ${message}`, { cause: err });
    }

    if (!isPlainObject(raw)) {
      throw new ConfigError(`Runtime config ${path} must be a JSON object`);
    }

    let section: unknown = raw;
    if (raw.runtime !== undefined) {
      if (!isPlainObject(raw.runtime)) {
        throw new ConfigError(`Runtime config ${path} field 'runtime' must be an object`);
      }
      section = raw.runtime;
    }

    const parsed = RuntimeConfigSchema.safeParse(section);
    if (!parsed.success) {
      throw new ConfigError(`Runtime config ${path} is invalid: ${formatZodIssues(parsed.error)}`, {
        cause: parsed.error,
      });
    }
    return { path, config: parsed.data };
  }

  if (explicit) {
    throw new ConfigError(`Runtime config file '${explicit}' from ML_UPGRADER_RUNTIME_CONFIG not found`);
  }
  return { path: null, config: {} };
}

async function resolveWorkingDirectory(
  root: string,
  value: string | undefined,
  configPath: string | null
): Promise<string> {
  if (!value) return root;
  const candidate = isAbsolute(value) ? value : join(root, value);
  if (await isDirectory(candidate)) return candidate;
  const location = configPath ? ` in ${configPath}` : "";
  throw new ConfigError(`Runtime config${location} references missing working directory '${value}'`);
}

function envInteger(env: NodeJS.ProcessEnv, name: string): number | null {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return null;
  const parsed = parseInteger(raw);
  if (parsed === null) {
    throw new ConfigError(`Environment variable ${name} must be an integer, got '${raw}'`);
  }
  return parsed;
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | null {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return null;
  const parsed = parseBool(raw);
  if (parsed === null) {
    throw new ConfigError(`Environment variable ${name} must be a boolean (1/0/true/false/yes/no/on/off), got '${raw}'`);
  }
  return parsed;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
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

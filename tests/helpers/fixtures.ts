import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { RuntimeSettings } from "../../src/core/runtime/runtime-config.js";
import type { ValidationResult } from "../../src/core/types.js";

export const LEGACY_SOURCE = [
  "import tensorflow as tf",
  "import numpy as np",
  "",
  "x = tf.placeholder(tf.float32, shape=[None, 3])",
  "with tf.Session() as sess:",
  "    print(np.asscalar(np.array([1])))",
  "",
].join("\n");

export const UPGRADED_SOURCE = [
  "import tensorflow as tf",
  "import numpy as np",
  "",
  "x = tf.Variable(tf.zeros([1, 3]))",
  "print(np.array([1]).item())",
  "",
].join("\n");

export async function makeTempDir(prefix = "ml-upgrader-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/** Write files given as POSIX relative path → content. */
export async function writeTree(root: string, files: Record<string, string | Uint8Array>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, ...relativePath.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function makeSettings(root: string, overrides: Partial<RuntimeSettings> = {}): RuntimeSettings {
  return {
    projectRoot: root,
    command: ["python", "main.py"],
    shell: false,
    commandSource: "runtime config test",
    cwd: root,
    timeoutSeconds: 60,
    setupCommands: [],
    skipInstall: false,
    forceReinstall: false,
    env: {},
    maxLogChars: 6000,
    venvPath: null,
    python: "python3",
    configPath: null,
    commandNote: null,
    ...overrides,
  };
}

export function failedResult(overrides: Partial<ValidationResult> = {}): ValidationResult {
  return {
    passed: false,
    stage: "runtime",
    reason: "Runtime command exited with status 1 (runtime config test)",
    stdout: "",
    stderr: "Traceback (most recent call last):\nValueError: boom",
    truncated: false,
    exitCode: 1,
    timedOut: false,
    steps: [],
    ...overrides,
  };
}

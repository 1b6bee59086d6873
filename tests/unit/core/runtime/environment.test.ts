import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile } from "node:fs/promises";
import { delimiter, join } from "node:path";
import { RunAbortedError } from "../../../../src/core/errors.js";
import {
  MARKER_FILENAME,
  RuntimeEnvironment,
  discoverRequirementFiles,
  extractMissingDistribution,
  extractMissingModule,
  mainScriptPath,
  selectVenvPath,
  venvPaths,
} from "../../../../src/core/runtime/environment.js";
import { makeSettings, makeTempDir, removeDir, writeTree } from "../../../helpers/fixtures.js";
import { FakeProcessExecutor, createMockLogger } from "../../../helpers/mocks.js";

let root: string;
let venv: string;
let python: string;

beforeEach(async () => {
  root = await makeTempDir("ml-upgrader-env-");
  venv = join(root, ".venv");
  python = venvPaths(venv).python;
});

afterEach(async () => {
  await removeDir(root);
});

describe("RuntimeEnvironment.prepare", () => {
  it("never runs an install command when skip_install is set", async () => {
    const executor = new FakeProcessExecutor();
    const env = new RuntimeEnvironment(makeSettings(root, { skipInstall: true }), executor, createMockLogger());

    const prepared = await env.prepare();

    expect(executor.requests).toHaveLength(0);
    expect(prepared.installEnabled).toBe(false);
    expect(prepared.venvPath).toBeNull();
    expect(prepared.steps.map((s) => s.label)).toEqual(["dependency_install"]);
    expect(prepared.steps[0]?.stdout).toBe("Dependency installation skipped by configuration");
  });

  it("reuses an existing virtualenv when skip_install is set", async () => {
    await writeTree(root, { ".venv/bin/python": "" });
    const executor = new FakeProcessExecutor();
    const env = new RuntimeEnvironment(makeSettings(root, { skipInstall: true }), executor, createMockLogger());

    const prepared = await env.prepare();

    expect(executor.requests).toHaveLength(0);
    expect(prepared.venvPath).toBe(venv);
    expect(prepared.pythonPath).toBe(python);
  });

  it.skipIf(process.platform === "win32")("creates the virtualenv and installs requirements", async () => {
    await mkdir(venv);
    await writeTree(root, { "requirements.txt": "numpy\n" });
    const executor = new FakeProcessExecutor();
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    const prepared = await env.prepare();

    expect(executor.commands()).toEqual([
      `python3 -m venv ${venv}`,
      `${python} -m pip install --upgrade pip setuptools wheel`,
      `${python} -m pip install -r ${join(root, "requirements.txt")}`,
    ]);
    expect(prepared.steps.map((s) => s.label)).toEqual([
      "create_virtualenv",
      "upgrade_toolchain",
      "dependency_install:requirements.txt",
    ]);
    expect(prepared.installOk).toBe(true);
    expect(prepared.installFailure).toBeNull();

    const marker: unknown = JSON.parse(await readFile(join(venv, MARKER_FILENAME), "utf-8"));
    expect(marker).toMatchObject({ editable_installed: false });
  });

  it("skips installation when the marker matches", async () => {
    await mkdir(venv);
    await writeTree(root, { "requirements.txt": "numpy\n" });
    await new RuntimeEnvironment(makeSettings(root), new FakeProcessExecutor(), createMockLogger()).prepare();

    const executor = new FakeProcessExecutor();
    const prepared = await new RuntimeEnvironment(makeSettings(root), executor, createMockLogger()).prepare();

    // The fake never creates the interpreter, so only venv creation repeats.
    expect(executor.requests).toHaveLength(1);
    expect(prepared.steps.map((s) => s.stdout).at(-1)).toBe("Dependencies already up to date");
  });

  it("reinstalls when the requirements change", async () => {
    await mkdir(venv);
    await writeTree(root, { "requirements.txt": "numpy\n" });
    await new RuntimeEnvironment(makeSettings(root), new FakeProcessExecutor(), createMockLogger()).prepare();
    await writeTree(root, { "requirements.txt": "numpy\ntorch\n" });

    const executor = new FakeProcessExecutor();
    await new RuntimeEnvironment(makeSettings(root), executor, createMockLogger()).prepare();

    expect(executor.count("-r ")).toBe(1);
  });

  it("falls back to installing a missing distribution by name", async () => {
    await writeTree(root, { "requirements.txt": "tensorflow==1.15.0\n" });
    const executor = new FakeProcessExecutor().on("-r ", {
      exitCode: 1,
      stderr: "ERROR: No matching distribution found for tensorflow==1.15.0",
    });
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    const prepared = await env.prepare();

    expect(prepared.steps.map((s) => s.label)).toContain("dependency_fallback:tensorflow");
    expect(executor.commands().at(-1)).toBe(`${python} -m pip install tensorflow`);
    expect(prepared.installOk).toBe(true);
  });

  it("records a failed install without throwing", async () => {
    await writeTree(root, { "requirements.txt": "broken\n" });
    const executor = new FakeProcessExecutor().on("-r ", { exitCode: 1, stderr: "ERROR: resolution impossible" });
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    const prepared = await env.prepare();

    expect(prepared.installOk).toBe(false);
    expect(prepared.installFailure).toBe("Dependency installation failed");
  });

  it("continues without a virtualenv when creation fails", async () => {
    const executor = new FakeProcessExecutor().on("-m venv", { exitCode: 1, stderr: "ensurepip is not available" });
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    const prepared = await env.prepare();

    expect(executor.requests).toHaveLength(1);
    expect(prepared).toMatchObject({
      venvPath: null,
      pythonPath: null,
      installEnabled: true,
      installOk: false,
      installFailure: "Failed to create virtual environment",
    });
  });

  it("prepares once per handle", async () => {
    const executor = new FakeProcessExecutor();
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    const [a, b] = await Promise.all([env.prepare(), env.prepare()]);
    await env.prepare();

    expect(a).toBe(b);
    expect(executor.count("-m venv")).toBe(1);
  });

  it("uses an explicit virtualenv path", async () => {
    const custom = join(root, "envs", "py");
    const executor = new FakeProcessExecutor();
    const env = new RuntimeEnvironment(makeSettings(root, { venvPath: custom }), executor, createMockLogger());

    const prepared = await env.prepare();

    expect(prepared.venvPath).toBe(custom);
    expect(executor.commands()[0]).toBe(`python3 -m venv ${custom}`);
  });

  it("throws RunAbortedError when an install step is aborted", async () => {
    const executor = new FakeProcessExecutor().on("-m venv", { exitCode: null, aborted: true });
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    await expect(env.prepare()).rejects.toBeInstanceOf(RunAbortedError);
  });

  it("passes the install timeout to every step", async () => {
    const executor = new FakeProcessExecutor();
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger(), { installTimeoutMs: 1234 });

    await env.prepare();

    expect(executor.requests.every((r) => r.timeoutMs === 1234)).toBe(true);
  });
});

describe("RuntimeEnvironment.installPackage", () => {
  it("installs into the prepared virtualenv", async () => {
    const executor = new FakeProcessExecutor();
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    const { ok, step } = await env.installPackage("einops");

    expect(ok).toBe(true);
    expect(step.label).toBe("auto_install:einops");
    expect(executor.commands().at(-1)).toBe(`${python} -m pip install einops`);
  });

  it("reports failure when the install fails", async () => {
    const executor = new FakeProcessExecutor().on("install einops", { exitCode: 1 });
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    expect((await env.installPackage("einops")).ok).toBe(false);
  });

  it("does not install without a virtualenv", async () => {
    const executor = new FakeProcessExecutor().on("-m venv", { exitCode: 1 });
    const env = new RuntimeEnvironment(makeSettings(root), executor, createMockLogger());

    const { ok, step } = await env.installPackage("einops");

    expect(ok).toBe(false);
    expect(step.command).toBe("skip");
    expect(executor.count("einops")).toBe(0);
  });
});

describe("RuntimeEnvironment.processEnv", () => {
  it("prepends the project root and virtualenv and applies overrides last", async () => {
    const settings = makeSettings(root, { env: { PATH: "/custom", SEED: "1" } });
    const env = new RuntimeEnvironment(settings, new FakeProcessExecutor(), createMockLogger());
    const prepared = await env.prepare();

    const result = env.processEnv(prepared, { PATH: "/usr/bin", PYTHONPATH: "/lib" });

    expect(result.PYTHONPATH).toBe(`${root}${delimiter}/lib`);
    expect(result.VIRTUAL_ENV).toBe(venv);
    expect(result.PATH).toBe("/custom");
    expect(result.SEED).toBe("1");
  });

  it("leaves PATH alone without a virtualenv", async () => {
    const env = new RuntimeEnvironment(
      makeSettings(root, { skipInstall: true }),
      new FakeProcessExecutor(),
      createMockLogger()
    );
    const prepared = await env.prepare();

    const result = env.processEnv(prepared, { PATH: "/usr/bin" });

    expect(result.PATH).toBe("/usr/bin");
    expect(result.VIRTUAL_ENV).toBeUndefined();
    expect(result.PYTHONPATH).toBe(root);
  });
});

describe("selectVenvPath", () => {
  it("prefers an existing directory", async () => {
    await mkdir(join(root, ".ml_upgrader_venv"));
    expect(await selectVenvPath(root)).toBe(join(root, ".ml_upgrader_venv"));
  });

  it("defaults to .venv", async () => {
    expect(await selectVenvPath(root)).toBe(venv);
  });
});

describe("discoverRequirementFiles", () => {
  it("finds requirements in the root, the cwd and beside the main script", async () => {
    await writeTree(root, {
      "requirements.txt": "a\n",
      "app/requirements.txt": "b\n",
      "app/train/requirements.txt": "c\n",
      "app/train/run.py": "",
    });
    const settings = makeSettings(root, {
      cwd: join(root, "app"),
      command: ["python", "-u", "train/run.py"],
    });

    expect(await discoverRequirementFiles(settings)).toEqual([
      join(root, "requirements.txt"),
      join(root, "app", "requirements.txt"),
      join(root, "app", "train", "requirements.txt"),
    ]);
  });
});

describe("mainScriptPath", () => {
  it("finds the script argument", () => {
    expect(mainScriptPath({ command: ["python", "-u", "main.py", "--epochs", "1"] })).toBe("main.py");
  });

  it("ignores modules and shell strings", () => {
    expect(mainScriptPath({ command: ["python", "-m", "pkg.train"] })).toBeNull();
    expect(mainScriptPath({ command: "python main.py" })).toBeNull();
  });
});

describe("extractMissingDistribution", () => {
  it("strips the version specifier", () => {
    expect(extractMissingDistribution("No matching distribution found for torch>=1.0")).toBe("torch");
  });

  it("returns null without a match", () => {
    expect(extractMissingDistribution("some other error")).toBeNull();
  });
});

describe("extractMissingModule", () => {
  it("returns the top-level package", () => {
    expect(extractMissingModule("ModuleNotFoundError: No module named 'sklearn.metrics'")).toBe("sklearn");
  });

  it("ignores private modules", () => {
    expect(extractMissingModule("No module named '_tkinter'")).toBeNull();
  });
});

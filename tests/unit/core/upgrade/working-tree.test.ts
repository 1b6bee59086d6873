import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { WorkspaceIOError } from "../../../../src/core/errors.js";
import { WorkingTree, copyRepository, decode } from "../../../../src/core/upgrade/working-tree.js";
import { makeTempDir, removeDir, writeTree } from "../../../helpers/fixtures.js";

let root: string;

beforeEach(async () => {
  root = await makeTempDir("ml-upgrader-tree-");
});

afterEach(async () => {
  await removeDir(root);
});

describe("WorkingTree", () => {
  it("reads and writes by POSIX relative path", async () => {
    const tree = new WorkingTree(root);
    await tree.write("pkg/sub/model.py", "x = 1\n");

    expect(await readFile(join(root, "pkg", "sub", "model.py"), "utf-8")).toBe("x = 1\n");
    expect((await tree.read("pkg/sub/model.py")).content).toBe("x = 1\n");
  });

  it("returns the raw bytes beside the decoded text and writes bytes unchanged", async () => {
    const tree = new WorkingTree(root);
    const latin = Buffer.from("s = 'caf\xe9'\n", "latin1");
    await tree.write("legacy.py", latin);

    const source = await tree.read("legacy.py");

    expect(source.content).toBe("s = 'café'\n");
    expect(Buffer.compare(Buffer.from(source.bytes), latin)).toBe(0);
  });

  it("wraps read failures in WorkspaceIOError", async () => {
    const tree = new WorkingTree(root);
    const error = await tree.read("missing.py").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WorkspaceIOError);
    expect(error).toMatchObject({ filePath: "missing.py" });
  });

  it("builds candidate files with absolute paths", () => {
    const tree = new WorkingTree(root);
    expect(tree.candidate("a/b.py", "code")).toEqual({
      relativePath: "a/b.py",
      absolutePath: join(root, "a", "b.py"),
      content: "code",
    });
  });
});

describe("decode", () => {
  it("decodes UTF-8", () => {
    expect(decode(Buffer.from("naïve = 1\n", "utf-8"))).toBe("naïve = 1\n");
  });

  it("falls back to Latin-1", () => {
    expect(decode(Uint8Array.from([0x63, 0x61, 0x66, 0xe9]))).toBe("café");
  });
});

describe("copyRepository", () => {
  it("replaces the target with a copy of the source", async () => {
    const source = join(root, "src");
    const target = join(root, "out");
    await writeTree(source, { "a.py": "a\n", "pkg/b.py": "b\n" });
    await writeTree(target, { "stale.py": "old\n" });

    await copyRepository(source, target);

    expect(await readFile(join(target, "pkg", "b.py"), "utf-8")).toBe("b\n");
    await expect(readFile(join(target, "stale.py"))).rejects.toThrow();
  });

  it("refuses overlapping directories", async () => {
    const source = join(root, "src");
    await writeTree(source, { "a.py": "a\n" });

    await expect(copyRepository(source, join(source, "out"))).rejects.toBeInstanceOf(WorkspaceIOError);
    await expect(copyRepository(source, source)).rejects.toThrow(/must not overlap/);
    await expect(copyRepository(source, root)).rejects.toThrow(/must not overlap/);
  });

  it("rejects a missing source", async () => {
    await expect(copyRepository(join(root, "nope"), join(root, "out"))).rejects.toThrow(/is not readable/);
  });
});

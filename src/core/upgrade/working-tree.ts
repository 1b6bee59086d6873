/**
 * File access for the repository being upgraded. Every failure surfaces as
 * a WorkspaceIOError naming the file.
 */
import { cp, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve } from "node:path";
import { WorkspaceIOError, errorMessage } from "../errors.js";
import type { CandidateFile } from "../types.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });
const latin1 = new TextDecoder("latin1");

/** A file's decoded text and the bytes it was decoded from */
export interface SourceFile {
  content: string;
  bytes: Uint8Array;
}

export class WorkingTree {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /** Absolute path of a POSIX relative path. */
  absolute(relativePath: string): string {
    return join(this.root, ...relativePath.split("/"));
  }

  async read(relativePath: string): Promise<SourceFile> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(this.absolute(relativePath));
    } catch (err) {
      throw new WorkspaceIOError(relativePath, `Failed to read ${relativePath}: ${errorMessage(err)}`, { cause: err });
    }
    return { content: decode(bytes), bytes };
  }

  /** Text is written as UTF-8; bytes are written unchanged. */
  async write(relativePath: string, content: string | Uint8Array): Promise<void> {
    const target = this.absolute(relativePath);
    try {
      await mkdir(dirname(target), { recursive: true });
      await (typeof content === "string" ? writeFile(target, content, "utf-8") : writeFile(target, content));
    } catch (err) {
      throw new WorkspaceIOError(relativePath, `Failed to write ${relativePath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  candidate(relativePath: string, content: string): CandidateFile {
    return { relativePath, absolutePath: this.absolute(relativePath), content };
  }
}

/** UTF-8, falling back to Latin-1 for legacy files that are not valid UTF-8. */
export function decode(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    return latin1.decode(bytes);
  }
}

/**
 * Replace `target` with a copy of `source`. Refuses to copy a directory into
 * itself or over its own parent.
 */
export async function copyRepository(source: string, target: string): Promise<void> {
  const from = resolve(source);
  const to = resolve(target);

  if (from === to || isInside(to, from) || isInside(from, to)) {
    throw new WorkspaceIOError(to, `Output directory ${to} must not overlap input directory ${from}`);
  }

  try {
    const info = await stat(from);
    if (!info.isDirectory()) {
      throw new Error("not a directory");
    }
  } catch (err) {
    throw new WorkspaceIOError(from, `Input directory ${from} is not readable: ${errorMessage(err)}`, { cause: err });
  }

  try {
    await rm(to, { recursive: true, force: true });
    await cp(from, to, { recursive: true });
  } catch (err) {
    throw new WorkspaceIOError(to, `Failed to copy ${from} to ${to}: ${errorMessage(err)}`, { cause: err });
  }
}

function isInside(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

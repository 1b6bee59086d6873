/**
 * Enumerate the files of a repository that are eligible for upgrade.
 */
import type { Dirent } from "node:fs";
import { open, readdir, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import { WorkspaceIOError, errorMessage } from "../errors.js";

/** Directories never descended into. */
export const EXCLUDED_DIRS = new Set([
  "__MACOSX",
  "__pycache__",
  ".git",
  ".hg",
  ".svn",
  ".venv",
  "venv",
  ".ml_upgrader_venv",
  ".tox",
  ".mypy_cache",
  "node_modules",
]);

const SNIFF_BYTES = 8192;

export interface DiscoveryOptions {
  /** Extensions with the leading dot, e.g. [".py"] */
  extensions: readonly string[];
  /** Called for a subdirectory that cannot be listed; it is skipped */
  onUnreadable?: (relativePath: string, error: unknown) => void;
}

/**
 * POSIX paths relative to `root`, sorted by code unit so the order is the
 * same on every platform and locale. Only an unreadable root is fatal. A file
 * that cannot be sniffed is still listed, so reading it fails that file alone.
 */
export async function discoverFiles(root: string, options: DiscoveryOptions): Promise<string[]> {
  const found: string[] = [];
  await walk(root, "", options, found);
  return found.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

async function walk(root: string, prefix: string, options: DiscoveryOptions, found: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(prefix ? join(root, ...prefix.split("/")) : root, { withFileTypes: true });
  } catch (err) {
    if (!prefix) {
      throw new WorkspaceIOError(root, `Cannot list ${root}: ${errorMessage(err)}`, { cause: err });
    }
    options.onUnreadable?.(prefix, err);
    return;
  }

  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if (!EXCLUDED_DIRS.has(entry.name)) {
        await walk(root, relativePath, options, found);
      }
      continue;
    }

    if (!entry.isFile() || !isEligibleName(entry.name, options.extensions)) continue;
    if (await looksBinary(join(root, ...relativePath.split("/")))) continue;
    found.push(relativePath);
  }
}

/** `._name` files are macOS resource-fork shadows, not source. */
export function isEligibleName(name: string, extensions: readonly string[]): boolean {
  if (name.startsWith("._")) return false;
  return extensions.some((ext) => name.endsWith(ext));
}

/** A NUL byte near the start means a placeholder or binary file. */
async function looksBinary(path: string): Promise<boolean> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(path, "r");
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } catch {
    // listed anyway; the engine's read then fails it as an io error
    return false;
  } finally {
    await handle?.close();
  }
}

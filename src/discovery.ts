import path from "node:path";
import fs from "node:fs/promises";
import type { Dir } from "node:fs";
import { errorMessage } from "./errors.js";
import { TEMP_PREFIX, isImageFile } from "./utils.js";

export interface DiscoveryOptions {
  /** Directories whose subtree is never entered, e.g. an output tree nested in the input. */
  exclude?: string[];
  /** Called for a subdirectory that cannot be read; the walk carries on without it. */
  onUnreadable?: (dir: string, err: unknown) => void;
}

function warnUnreadable(dir: string, err: unknown): void {
  console.warn(`Warning: skipping unreadable directory ${dir}: ${errorMessage(err)}`);
}

async function isSymlinkToFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    // Dangling or looping links are not files.
    if (code === "ENOENT" || code === "ELOOP" || code === "EACCES") return false;
    throw err;
  }
}

async function* walk(
  dir: string,
  recursive: boolean,
  excluded: Set<string>,
  onUnreadable: (dir: string, err: unknown) => void,
  isRoot: boolean,
): AsyncGenerator<string> {
  let handle: Dir;
  try {
    handle = await fs.opendir(dir);
  } catch (err) {
    if (isRoot) throw err;
    onUnreadable(dir, err);
    return;
  }

  const subdirectories: string[] = [];
  try {
    for await (const entry of handle) {
      const entryPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (recursive && !excluded.has(path.resolve(entryPath))) {
          subdirectories.push(entryPath);
        }
        continue;
      }

      if (entry.name.startsWith(TEMP_PREFIX) || !isImageFile(entry.name)) continue;

      if (entry.isFile() || (entry.isSymbolicLink() && (await isSymlinkToFile(entryPath)))) {
        yield entryPath;
      }
    }
  } catch (err) {
    if (isRoot) throw err;
    onUnreadable(dir, err);
    return;
  }

  for (const subdirectory of subdirectories) {
    yield* walk(subdirectory, true, excluded, onUnreadable, false);
  }
}

/**
 * Lazily yields the supported image files under `root`, in directory
 * traversal order. Symbolic links to directories are never followed. An
 * unreadable root fails the walk; unreadable subdirectories are skipped.
 */
export function discoverImages(root: string, recursive = false, options: DiscoveryOptions = {}): AsyncGenerator<string> {
  const excluded = new Set((options.exclude ?? []).map((dir) => path.resolve(dir)));
  return walk(root, recursive, excluded, options.onUnreadable ?? warnUnreadable, true);
}

/** Reads `source` to the end before yielding anything. */
export async function* snapshot<T>(source: AsyncIterable<T>): AsyncGenerator<T> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  yield* items;
}

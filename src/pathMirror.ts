import path from "node:path";
import fs from "node:fs/promises";
import { PathError, errorMessage } from "./errors.js";

/** True when `candidate` is `root` itself or lies anywhere below it. */
export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  return !(relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative));
}

/**
 * Maps a source file to its place in the output tree: same relative directory,
 * extension replaced by the lower-cased format.
 */
export function outputPath(inputRoot: string, sourcePath: string, outputRoot: string, format: string): string {
  const relative = path.relative(path.resolve(inputRoot), path.resolve(sourcePath));

  if (relative === "" || !isWithin(inputRoot, sourcePath)) {
    throw new PathError(`${sourcePath} is not inside ${inputRoot}`);
  }

  const { dir, name } = path.parse(relative);
  return path.join(outputRoot, dir, `${name}.${format.toLowerCase()}`);
}

// mkdir -p already treats an existing directory as success, including when
// another task creates it first.
export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new PathError(`cannot create output directory ${dir}: ${errorMessage(err)}`, { cause: err });
  }
}

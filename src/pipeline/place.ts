import path from "node:path";
import fs from "node:fs/promises";
import { OUTPUT_PREFIX } from "../constants.js";
import { PlacementError, errnoCode } from "../errors.js";

export interface PlaceOptions {
  // unset: next to the source video
  outputDir?: string;
  // directory the batch was resolved from; its layout is kept under outputDir
  sourceRoot?: string;
}

/**
 * Final path of the subtitled copy of `sourcePath`. Under an output directory
 * the source's folders below `sourceRoot` are kept, so same-named videos from
 * different folders never share a destination.
 */
export function destinationFor(sourcePath: string, opts: PlaceOptions = {}): string {
  const name = `${OUTPUT_PREFIX}${path.basename(sourcePath)}`;
  if (!opts.outputDir) return path.join(path.dirname(sourcePath), name);

  const rel = opts.sourceRoot ? path.relative(opts.sourceRoot, path.dirname(sourcePath)) : "";
  const inside = rel !== "" && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
  return path.join(opts.outputDir, inside ? rel : "", name);
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (err) {
    // workspace and destination on different filesystems
    if (errnoCode(err) !== "EXDEV") throw err;
    await fs.copyFile(from, to);
    await fs.unlink(from);
  }
}

/**
 * Move a finished video out of the workspace to its final name, replacing a
 * file left by an earlier run.
 */
export async function placeOutput(artifactPath: string, sourcePath: string, opts: PlaceOptions = {}): Promise<string> {
  const dest = destinationFor(sourcePath, opts);
  try {
    if (opts.outputDir) await fs.mkdir(path.dirname(dest), { recursive: true });
    const existing = await fs.lstat(dest).catch((err: unknown) => {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    });
    if (existing?.isDirectory()) {
      throw new PlacementError(`cannot place output at ${dest}: a directory is in the way`);
    }
    await moveFile(artifactPath, dest);
  } catch (err) {
    if (err instanceof PlacementError) throw err;
    throw new PlacementError(`failed to place output at ${dest}`, { cause: err });
  }
  return dest;
}

import path from "node:path";
import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import { PathError, UnsupportedFormatError, errnoCode } from "../errors.js";

export interface ResolveOptions {
  // lower-case, dot-prefixed allow-list, e.g. [".mp4", ".mov"]
  extensions: readonly string[];
}

export function isSupportedVideo(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext !== "" && extensions.some((allowed) => allowed.toLowerCase() === ext);
}

async function statOrThrow(target: string, input: string) {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new PathError(target, `${input} does not exist`, { cause: err });
    }
    throw new PathError(target, `${input} cannot be read`, { cause: err });
  }
}

async function readDir(dir: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new PathError(dir, `failed to read directory ${dir}`, { cause: err });
  }
}

async function walk(dir: string, extensions: readonly string[], found: string[]): Promise<void> {
  for (const entry of await readDir(dir)) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, extensions, found);
    } else if (entry.isFile()) {
      if (isSupportedVideo(full, extensions)) found.push(full);
    } else if (entry.isSymbolicLink() && isSupportedVideo(full, extensions)) {
      // linked files count, linked directories are not followed
      const target = await fs.stat(full).catch((err: unknown) => {
        // dangling link
        if (errnoCode(err) === "ENOENT") return null;
        throw new PathError(full, `${full} cannot be read`, { cause: err });
      });
      if (target?.isFile()) found.push(full);
    }
  }
}

/**
 * Turn the user's input path into the videos to process: the file itself,
 * or every supported file below a directory in lexical path order.
 */
export async function resolveVideoPaths(input: string, opts: ResolveOptions): Promise<string[]> {
  const root = path.resolve(input);
  const info = await statOrThrow(root, input);

  if (info.isFile()) {
    if (!isSupportedVideo(root, opts.extensions)) {
      throw new UnsupportedFormatError(input, path.extname(root), opts.extensions);
    }
    return [root];
  }

  if (!info.isDirectory()) {
    throw new PathError(root, `${input} is neither a file nor a directory`);
  }

  const found: string[] = [];
  await walk(root, opts.extensions, found);
  return found.sort();
}

import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { SetupError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../utils/logger.js";

export interface Workspace {
  readonly dir: string;
  /**
   * Per-task file name inside the workspace; tasks never share a path.
   * Characters outside [A-Za-z0-9_.-] become "_" so the path survives
   * quoting in ffmpeg filter expressions.
   */
  artifactPath(taskId: number, name: string): string;
}

export interface WorkspaceOptions {
  parentDir?: string;
  prefix?: string;
  logger?: Logger;
}

export async function createWorkspace(opts: WorkspaceOptions = {}): Promise<Workspace> {
  const parentDir = opts.parentDir ?? os.tmpdir();
  let dir: string;
  try {
    dir = await fs.mkdtemp(path.join(parentDir, opts.prefix ?? "subtitle-burner-"));
  } catch (err) {
    throw new SetupError(`failed to create workspace in ${parentDir}`, { cause: err });
  }
  return {
    dir,
    artifactPath(taskId, name) {
      const safe = path.basename(name).replace(/[^\w.-]/g, "_");
      return path.join(dir, `${taskId}_${safe}`);
    },
  };
}

/**
 * Run `fn` with a fresh workspace and remove it afterwards, whatever `fn` does.
 */
export async function withWorkspace<T>(
  fn: (workspace: Workspace) => Promise<T>,
  opts: WorkspaceOptions = {}
): Promise<T> {
  const log = opts.logger ?? rootLogger;
  const workspace = await createWorkspace(opts);
  log.debug({ dir: workspace.dir }, "workspace created");
  try {
    return await fn(workspace);
  } finally {
    try {
      await fs.rm(workspace.dir, { recursive: true, force: true });
      log.debug({ dir: workspace.dir }, "workspace removed");
    } catch (err) {
      log.warn({ err, dir: workspace.dir }, "workspace cleanup failed");
    }
  }
}

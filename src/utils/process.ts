import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { TranscriberError, errorMessage } from "../errors.js";

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

export class CommandError extends TranscriberError {
  readonly command: string;
  readonly args: string[];
  // null when the process never ran or was killed
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    command: string,
    args: string[],
    exitCode: number | null,
    stderr: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Command failed (${command} ${args.join(" ")}): code=${exitCode ?? "none"}\nSTDERR: ${stderr}`,
      "COMMAND",
      options
    );
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

function stderrOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err) {
    const value = err.stderr;
    if (typeof value === "string") return value;
    if (Buffer.isBuffer(value)) return value.toString("utf8");
  }
  return "";
}

function exitCodeOf(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "number") {
    return err.code;
  }
  return null;
}

/**
 * Run an executable without a shell. Resolves only on exit code 0.
 */
export const runCommand: CommandRunner = async (command, args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      signal: options?.signal,
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
      windowsHide: true,
    });
    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    const stderr = stderrOf(err) || errorMessage(err);
    throw new CommandError(command, args, exitCodeOf(err), stderr, { cause: err });
  }
};

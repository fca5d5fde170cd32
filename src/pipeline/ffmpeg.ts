import { BurnError, ExtractionError, SetupError } from "../errors.js";
import { runCommand, type CommandRunner } from "../utils/process.js";

export interface FfmpegOptions {
  ffmpegCmd: string;
  run?: CommandRunner;
  // 0 or unset: wait for ffmpeg however long it takes
  timeoutMs?: number;
  signal?: AbortSignal;
}

const QUIET = ["-hide_banner", "-nostdin", "-loglevel", "error"];

async function ffmpeg(args: string[], opts: FfmpegOptions) {
  const run = opts.run ?? runCommand;
  return run(opts.ffmpegCmd, [...QUIET, ...args], {
    timeoutMs: opts.timeoutMs || undefined,
    signal: opts.signal,
  });
}

/**
 * Check that the configured ffmpeg binary can be executed.
 */
export async function probeFfmpeg(opts: FfmpegOptions): Promise<string> {
  const run = opts.run ?? runCommand;
  try {
    const { stdout } = await run(opts.ffmpegCmd, ["-version"], { timeoutMs: 15000 });
    return stdout.split("\n")[0]?.trim() ?? "";
  } catch (err) {
    throw new SetupError(
      `ffmpeg is required but "${opts.ffmpegCmd}" could not be run.\n\n` +
        "Install it with:\n" +
        "  macOS:    brew install ffmpeg\n" +
        "  Ubuntu:   sudo apt install ffmpeg\n" +
        "  Arch:     sudo pacman -S ffmpeg\n" +
        "  Windows:  winget install ffmpeg\n" +
        "or point FFMPEG_CMD at the binary.",
      { cause: err }
    );
  }
}

/**
 * Strip the audio track of `sourcePath` into `outPath`. `-y` overwrites an
 * artifact left by an earlier run.
 */
export async function extractAudio(sourcePath: string, outPath: string, opts: FfmpegOptions): Promise<string> {
  try {
    await ffmpeg(["-y", "-i", sourcePath, "-vn", outPath], opts);
  } catch (err) {
    throw new ExtractionError(`error while converting ${sourcePath} to audio`, { cause: err });
  }
  return outPath;
}

/**
 * Render the subtitle file into the frames of `sourcePath`, writing `outPath`.
 * `filterPath` must already be escaped for the filter expression.
 */
export async function burnSubtitles(
  sourcePath: string,
  filterPath: string,
  outPath: string,
  opts: FfmpegOptions
): Promise<string> {
  try {
    await ffmpeg(["-y", "-i", sourcePath, "-vf", `subtitles='${filterPath}'`, outPath], opts);
  } catch (err) {
    throw new BurnError(`error while adding subtitles to ${sourcePath}`, { cause: err });
  }
  return outPath;
}

import path from "node:path";
import type { ModelVariant } from "../constants.js";
import { CancelledError, TaskFailedError, toStageError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../utils/logger.js";
import type {
  PipelineStage,
  SubtitleFile,
  TaskOutcome,
  TaskState,
  Transcriber,
  Transcript,
  VideoTask,
} from "../types.js";
import { burnSubtitles, extractAudio, type FfmpegOptions } from "./ffmpeg.js";
import { placeOutput } from "./place.js";
import { writeSubtitleFile } from "./subtitles.js";
import type { Workspace } from "./workspace.js";

export interface StageContext {
  task: VideoTask;
  workspace: Workspace;
  signal?: AbortSignal;
}

/**
 * The five steps that turn one source video into a subtitled copy.
 */
export interface VideoStages {
  extractAudio(ctx: StageContext): Promise<string>;
  transcribe(ctx: StageContext, audioPath: string): Promise<Transcript>;
  formatSubtitles(ctx: StageContext, transcript: Transcript): Promise<SubtitleFile>;
  burnSubtitles(ctx: StageContext, subtitles: SubtitleFile): Promise<string>;
  placeOutput(ctx: StageContext, artifactPath: string): Promise<string>;
}

export interface VideoStageDeps {
  ffmpeg: Omit<FfmpegOptions, "signal">;
  transcriber: Transcriber;
  variant: ModelVariant;
  outputDir?: string;
  sourceRoot?: string;
}

export function createVideoStages(deps: VideoStageDeps): VideoStages {
  return {
    extractAudio: ({ task, workspace, signal }) => {
      const base = path.basename(task.sourcePath);
      return extractAudio(task.sourcePath, workspace.artifactPath(task.id, `${base}_audio.mp3`), {
        ...deps.ffmpeg,
        signal,
      });
    },
    transcribe: ({ signal }, audioPath) =>
      deps.transcriber.transcribe({ audioPath, variant: deps.variant, signal }),
    formatSubtitles: ({ task, workspace }, transcript) => {
      const base = path.basename(task.sourcePath);
      return writeSubtitleFile(transcript, workspace.artifactPath(task.id, `${base}_subs.srt`));
    },
    burnSubtitles: ({ task, workspace, signal }, subtitles) => {
      const base = path.basename(task.sourcePath);
      return burnSubtitles(
        task.sourcePath,
        subtitles.filterPath,
        workspace.artifactPath(task.id, `transcribed_${base}`),
        { ...deps.ffmpeg, signal }
      );
    },
    placeOutput: ({ task }, artifactPath) =>
      placeOutput(artifactPath, task.sourcePath, { outputDir: deps.outputDir, sourceRoot: deps.sourceRoot }),
  };
}

export function createTask(id: number, sourcePath: string): VideoTask {
  return { id, sourcePath, state: "pending" };
}

export interface RunVideoOptions {
  workspace: Workspace;
  signal?: AbortSignal;
  logger?: Logger;
  onStateChange?: (task: VideoTask, state: TaskState) => void;
}

/**
 * Drive one task through extracting -> transcribing -> formatting -> burning
 * -> placing. Resolves with the terminal outcome; never rejects. A failed
 * stage ends the task, so nothing reaches the destination unless every
 * earlier stage succeeded.
 */
export async function runVideoPipeline(
  task: VideoTask,
  stages: VideoStages,
  opts: RunVideoOptions
): Promise<TaskOutcome> {
  if (task.state !== "pending") {
    throw new Error(`task ${task.id} already ran (state ${task.state})`);
  }
  const log = (opts.logger ?? rootLogger).child({ task: task.id, source: task.sourcePath });
  const { signal } = opts;
  const ctx: StageContext = { task, workspace: opts.workspace, signal };

  const enter = (state: TaskState) => {
    task.state = state;
    opts.onStateChange?.(task, state);
  };

  const at: { stage: PipelineStage } = { stage: "extracting" };
  const step = async <T>(stage: PipelineStage, run: () => Promise<T>): Promise<T> => {
    at.stage = stage;
    if (signal?.aborted) throw new CancelledError(stage, { cause: signal.reason });
    enter(stage);
    log.debug({ stage }, "stage started");
    return run();
  };

  try {
    const audioPath = await step("extracting", () => stages.extractAudio(ctx));
    const transcript = await step("transcribing", () => stages.transcribe(ctx, audioPath));
    const subtitles = await step("formatting", () => stages.formatSubtitles(ctx, transcript));
    const burned = await step("burning", () => stages.burnSubtitles(ctx, subtitles));
    const outputPath = await step("placing", () => stages.placeOutput(ctx, burned));

    const outcome: TaskOutcome = { status: "done", outputPath };
    task.outcome = outcome;
    enter("done");
    log.info({ outputPath }, "video done");
    return outcome;
  } catch (err) {
    // anything that fails once the batch is cancelled counts as cancelled
    const cause =
      signal?.aborted && !(err instanceof CancelledError)
        ? new CancelledError(at.stage, { cause: err })
        : toStageError(at.stage, err);
    const error = new TaskFailedError(task.sourcePath, at.stage, cause);
    const outcome: TaskOutcome = { status: "failed", stage: at.stage, error };
    task.outcome = outcome;
    enter("failed");
    log.error({ err: cause, stage: at.stage }, "video failed");
    return outcome;
  }
}

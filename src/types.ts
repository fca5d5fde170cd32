import type { ModelVariant } from "./constants.js";
import type { TaskFailedError } from "./errors.js";

export interface TranscriptSegment {
  start: number; // seconds
  end: number; // seconds
  text: string;
}

export interface Transcript {
  language: string;
  segments: TranscriptSegment[];
}

export interface SubtitleFile {
  path: string;
  content: string;
  // path escaped for embedding in an ffmpeg filter expression
  filterPath: string;
}

export interface BatchJob {
  readonly rootPath: string;
  readonly sources: readonly string[];
}

export type PipelineStage =
  | "extracting"
  | "transcribing"
  | "formatting"
  | "burning"
  | "placing";

export type TaskState = "pending" | PipelineStage | "done" | "failed";

export type TaskOutcome =
  | { status: "done"; outputPath: string }
  | { status: "failed"; stage: PipelineStage; error: TaskFailedError };

export interface VideoTask {
  readonly id: number;
  readonly sourcePath: string;
  state: TaskState;
  outcome?: TaskOutcome;
}

export interface BatchFailure {
  sourcePath: string;
  stage: PipelineStage;
  error: TaskFailedError;
}

export interface BatchOutput {
  sourcePath: string;
  outputPath: string;
}

export interface BatchResult {
  total: number;
  succeeded: number;
  failures: BatchFailure[];
  outputs: BatchOutput[];
  cancelled: boolean;
  elapsedMs: number;
}

export interface BatchProgress {
  completed: number;
  total: number;
  last: { sourcePath: string; outcome: TaskOutcome };
}

export interface TranscribeRequest {
  audioPath: string;
  variant: ModelVariant;
  signal?: AbortSignal;
}

export interface Transcriber {
  transcribe(req: TranscribeRequest): Promise<Transcript>;
}

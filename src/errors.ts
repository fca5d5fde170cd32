import type { PipelineStage } from "./types.js";

export type ErrorCode =
  | "SETUP"
  | "USAGE"
  | "PATH"
  | "COMMAND"
  | "EXTRACTION"
  | "TRANSCRIPTION"
  | "FORMAT"
  | "BURN"
  | "PLACEMENT"
  | "CANCELLED"
  | "TASK_FAILED";

/**
 * Base class for every error the application raises on purpose.
 */
export class TranscriberError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

// Fatal before any task starts: missing tool or credential, bad input path
export class SetupError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SETUP", options);
  }
}

export class UnsupportedFormatError extends SetupError {
  readonly extension: string;

  constructor(filePath: string, extension: string, allowed: readonly string[]) {
    super(
      `${filePath} has unsupported extension "${extension || "(none)"}"; expected one of ${allowed.join(", ")}`
    );
    this.extension = extension;
  }
}

export class UsageError extends TranscriberError {
  constructor(message: string) {
    super(message, "USAGE");
  }
}

export class PathError extends TranscriberError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, "PATH", options);
    this.path = path;
  }
}

/**
 * Failure of one pipeline stage for one video. Never fatal for a batch.
 */
export abstract class StageError extends TranscriberError {
  abstract readonly stage: PipelineStage;
}

export class ExtractionError extends StageError {
  readonly stage = "extracting";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "EXTRACTION", options);
  }
}

export class TranscriptionError extends StageError {
  readonly stage = "transcribing";
  // the remote service rejected our credential; no later task can succeed
  readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown; fatal?: boolean }) {
    super(message, "TRANSCRIPTION", options);
    this.fatal = options?.fatal ?? false;
  }
}

export class FormatError extends StageError {
  readonly stage = "formatting";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "FORMAT", options);
  }
}

export class BurnError extends StageError {
  readonly stage = "burning";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "BURN", options);
  }
}

export class PlacementError extends StageError {
  readonly stage = "placing";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PLACEMENT", options);
  }
}

export class CancelledError extends StageError {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, options?: { cause?: unknown }) {
    super(`cancelled at ${stage}`, "CANCELLED", options);
    this.stage = stage;
  }
}

const stageErrorClasses: Record<
  PipelineStage,
  new (message: string, options?: { cause?: unknown }) => StageError
> = {
  extracting: ExtractionError,
  transcribing: TranscriptionError,
  formatting: FormatError,
  burning: BurnError,
  placing: PlacementError,
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// `code` of a Node system error such as ENOENT or EXDEV
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Normalise anything a stage threw into that stage's error class.
 */
export function toStageError(stage: PipelineStage, err: unknown): StageError {
  if (err instanceof StageError) return err;
  const ErrorClass = stageErrorClasses[stage];
  return new ErrorClass(errorMessage(err), { cause: err });
}

/**
 * A stage error tagged with the task it belongs to, so a batch report reads
 * without the logs.
 */
export class TaskFailedError extends TranscriberError {
  readonly sourcePath: string;
  readonly stage: PipelineStage;
  override readonly cause: StageError;

  constructor(sourcePath: string, stage: PipelineStage, cause: StageError) {
    super(`${stage} failed for ${sourcePath}: ${cause.message}`, "TASK_FAILED", { cause });
    this.sourcePath = sourcePath;
    this.stage = stage;
    this.cause = cause;
  }
}

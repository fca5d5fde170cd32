import PQueue from "p-queue";
import { TaskFailedError, TranscriptionError, toStageError } from "../errors.js";
import { createTask } from "../pipeline/video.js";
import { logger as rootLogger, type Logger } from "../utils/logger.js";
import type {
  BatchFailure,
  BatchJob,
  BatchOutput,
  BatchProgress,
  BatchResult,
  PipelineStage,
  TaskOutcome,
  VideoTask,
} from "../types.js";

export interface BatchOptions {
  runTask: (task: VideoTask, signal: AbortSignal) => Promise<TaskOutcome>;
  // tasks in flight at once
  concurrency?: number;
  // aborting it cancels the batch at the next stage boundary of every task
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
  // failures that make every remaining task pointless
  cancelOn?: (failure: BatchFailure) => boolean;
  logger?: Logger;
}

export function createBatchJob(rootPath: string, sources: readonly string[]): BatchJob {
  return Object.freeze({ rootPath, sources: Object.freeze([...sources]) });
}

// a rejected credential fails every later upload too
export function isFatalFailure(failure: BatchFailure): boolean {
  return failure.error.cause instanceof TranscriptionError && failure.error.cause.fatal;
}

/**
 * Sole writer of a batch's counters. `record` is synchronous, so calls from
 * concurrently running tasks cannot interleave.
 */
export class ResultCollector {
  private readonly seen = new Set<number>();
  private readonly failures: (BatchFailure & { id: number })[] = [];
  private readonly outputs: (BatchOutput & { id: number })[] = [];
  private succeeded = 0;

  constructor(
    private readonly total: number,
    private readonly onProgress?: (progress: BatchProgress) => void,
    private readonly log: Logger = rootLogger
  ) {}

  get completed(): number {
    return this.seen.size;
  }

  record(task: VideoTask, outcome: TaskOutcome): BatchFailure | undefined {
    if (this.seen.has(task.id)) {
      throw new Error(`outcome for task ${task.id} recorded twice`);
    }
    this.seen.add(task.id);

    let failure: BatchFailure | undefined;
    if (outcome.status === "done") {
      this.succeeded += 1;
      this.outputs.push({ id: task.id, sourcePath: task.sourcePath, outputPath: outcome.outputPath });
    } else {
      failure = { sourcePath: task.sourcePath, stage: outcome.stage, error: outcome.error };
      this.failures.push({ id: task.id, ...failure });
    }

    try {
      this.onProgress?.({
        completed: this.seen.size,
        total: this.total,
        last: { sourcePath: task.sourcePath, outcome },
      });
    } catch (err) {
      // outcome is already recorded
      this.log.warn({ err, source: task.sourcePath }, "progress callback failed");
    }
    return failure;
  }

  finish(elapsedMs: number, cancelled: boolean): BatchResult {
    const byId = (a: { id: number }, b: { id: number }) => a.id - b.id;
    return {
      total: this.total,
      succeeded: this.succeeded,
      failures: [...this.failures].sort(byId).map(({ id: _id, ...f }) => f),
      outputs: [...this.outputs].sort(byId).map(({ id: _id, ...o }) => o),
      cancelled,
      elapsedMs,
    };
  }
}

function stageOf(task: VideoTask): PipelineStage {
  switch (task.state) {
    case "pending":
    case "done":
    case "failed":
      return "extracting";
    default:
      return task.state;
  }
}

/**
 * Run every video of the job on a bounded pool and join them all. A task
 * failure never stops its siblings and never makes this reject; only a
 * `cancelOn` match or the caller's signal cancels what is still pending.
 */
export async function runBatch(job: BatchJob, opts: BatchOptions): Promise<BatchResult> {
  const log = opts.logger ?? rootLogger;
  const started = Date.now();
  const cancelOn = opts.cancelOn ?? isFatalFailure;
  const tasks = job.sources.map((source, i) => createTask(i, source));
  const collector = new ResultCollector(tasks.length, opts.onProgress, log);

  const controller = new AbortController();
  const forwardAbort = () => controller.abort(opts.signal?.reason);
  if (opts.signal?.aborted) forwardAbort();
  else opts.signal?.addEventListener("abort", forwardAbort, { once: true });

  const queue = new PQueue({ concurrency: Math.max(1, opts.concurrency ?? 4) });
  log.info({ root: job.rootPath, total: tasks.length, concurrency: queue.concurrency }, "batch started");

  const runOne = async (task: VideoTask) => {
    let outcome: TaskOutcome;
    try {
      outcome = await opts.runTask(task, controller.signal);
    } catch (err) {
      // runTask should resolve with an outcome; keep the count whole if it throws
      const stage = stageOf(task);
      outcome = { status: "failed", stage, error: new TaskFailedError(task.sourcePath, stage, toStageError(stage, err)) };
    }

    const failure = collector.record(task, outcome);
    if (failure && !controller.signal.aborted && cancelOn(failure)) {
      log.warn({ source: failure.sourcePath, err: failure.error }, "fatal failure, cancelling remaining tasks");
      controller.abort(failure.error);
    }
  };

  let settled: PromiseSettledResult<void>[];
  try {
    // every task joins before an error surfaces
    settled = await Promise.allSettled(tasks.map((task) => queue.add(() => runOne(task))));
  } finally {
    opts.signal?.removeEventListener("abort", forwardAbort);
  }
  const broken = settled.find((r): r is PromiseRejectedResult => r.status === "rejected");
  if (broken) throw broken.reason;

  const result = collector.finish(Date.now() - started, controller.signal.aborted);
  log.info(
    { total: result.total, succeeded: result.succeeded, failed: result.failures.length, cancelled: result.cancelled },
    "batch finished"
  );
  return result;
}

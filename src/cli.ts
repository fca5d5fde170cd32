import fs from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { loadConfig, type AppConfig } from "./config.js";
import { DEFAULT_MODEL_VARIANT, MODEL_VARIANTS, isModelVariant, type ModelVariant } from "./constants.js";
import { SetupError, TranscriberError, UsageError, errorMessage } from "./errors.js";
import { createBatchJob, runBatch } from "./async/batch.js";
import { probeFfmpeg } from "./pipeline/ffmpeg.js";
import { resolveVideoPaths } from "./pipeline/paths.js";
import { GeminiTranscriber } from "./pipeline/transcribe_gemini.js";
import { createVideoStages, runVideoPipeline } from "./pipeline/video.js";
import { withWorkspace } from "./pipeline/workspace.js";
import { logger } from "./utils/logger.js";
import type { CommandRunner } from "./utils/process.js";
import type { BatchResult, Transcriber } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
// directory mode: the batch ran but some videos failed
export const EXIT_PARTIAL = 2;
export const EXIT_USAGE = 64;

export const USAGE = `Usage: transcribe-burn --input <file|directory> [options]

Options:
  -i, --input <path>        video file, or directory to search recursively (required)
  -m, --model <variant>     ${MODEL_VARIANTS.join(" | ")} (default: ${DEFAULT_MODEL_VARIANT})
  -o, --output-dir <dir>    where transcribed_<name> files go (default: beside each source)
  -c, --concurrency <n>     videos processed at once (default: CONCURRENCY or 4)
  -h, --help                show this help`;

export interface CliOptions {
  input: string;
  model: ModelVariant;
  outputDir?: string;
  concurrency?: number;
}

const CliSchema = z.object({
  input: z.string({ required_error: "--input is required" }).min(1, "--input is required"),
  model: z
    .string()
    .refine(isModelVariant, { message: `--model must be one of: ${MODEL_VARIANTS.join(", ")}` })
    .default(DEFAULT_MODEL_VARIANT),
  "output-dir": z.string().min(1).optional(),
  concurrency: z.coerce
    .number({ invalid_type_error: "--concurrency must be a number" })
    .int("--concurrency must be a whole number")
    .min(1, "--concurrency must be at least 1")
    .max(64, "--concurrency must be at most 64")
    .optional(),
});

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        input: { type: "string", short: "i" },
        model: { type: "string", short: "m" },
        "output-dir": { type: "string", short: "o" },
        concurrency: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
}

/**
 * Parse argv (without node and script). Returns null when help was asked for.
 */
export function parseCliArgs(argv: string[]): CliOptions | null {
  const values = readArgv(argv);
  if (values.help) return null;

  const parsed = CliSchema.safeParse(values);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return {
    input: parsed.data.input,
    model: parsed.data.model,
    outputDir: parsed.data["output-dir"],
    concurrency: parsed.data.concurrency,
  };
}

export function formatSummary(result: BatchResult): string {
  const seconds = (result.elapsedMs / 1000).toFixed(2);
  return `Processed ${result.succeeded} videos successfully; ${result.failures.length} failed in ${seconds} seconds`;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
  createTranscriber?: (cfg: AppConfig & { apiKey: string }) => Transcriber;
  signal?: AbortSignal;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

function requireApiKey(cfg: AppConfig): AppConfig & { apiKey: string } {
  const { apiKey } = cfg;
  if (!apiKey) {
    throw new SetupError(
      "GEMINI_API_KEY is not set.\n\n" +
        "Create an API key:\n" +
        "  1. Go to https://ai.google.dev\n" +
        "  2. Create a project (or select an existing one)\n" +
        "  3. Generate an API key\n" +
        "then export it or add it to a .env file in the current directory."
    );
  }
  return { ...cfg, apiKey };
}

/**
 * Entry point behind the binary. Resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = deps.err ?? ((line: string) => process.stderr.write(`${line}\n`));

  let opts: CliOptions | null;
  try {
    opts = parseCliArgs(argv);
  } catch (e) {
    err(`${errorMessage(e)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  if (!opts) {
    out(USAGE);
    return EXIT_OK;
  }

  try {
    const cfg = requireApiKey(loadConfig(deps.env));
    logger.level = cfg.logLevel;
    const log = logger.child({ component: "cli" });

    const ffmpegVersion = await probeFfmpeg({ ffmpegCmd: cfg.ffmpegCmd, run: deps.run });
    log.debug({ ffmpeg: ffmpegVersion }, "ffmpeg found");

    const sources = await resolveVideoPaths(opts.input, { extensions: cfg.videoExtensions });
    const directoryMode = (await fs.stat(opts.input)).isDirectory();
    const job = createBatchJob(opts.input, sources);

    const transcriber = deps.createTranscriber
      ? deps.createTranscriber(cfg)
      : new GeminiTranscriber({
          apiKey: cfg.apiKey,
          baseUrl: cfg.geminiBaseUrl,
          timeoutMs: cfg.transcribeTimeoutMs,
        });
    const stages = createVideoStages({
      ffmpeg: { ffmpegCmd: cfg.ffmpegCmd, run: deps.run, timeoutMs: cfg.commandTimeoutMs },
      transcriber,
      variant: opts.model,
      outputDir: opts.outputDir ? path.resolve(opts.outputDir) : cfg.outputDir,
      sourceRoot: directoryMode ? path.resolve(opts.input) : undefined,
    });

    const concurrency = opts.concurrency ?? cfg.concurrency;
    const result = await withWorkspace(
      (workspace) =>
        runBatch(job, {
          runTask: (task, signal) => runVideoPipeline(task, stages, { workspace, signal, logger: log }),
          concurrency,
          signal: deps.signal,
          logger: log,
          onProgress: (p) =>
            log.info(
              { completed: p.completed, total: p.total, source: p.last.sourcePath, status: p.last.outcome.status },
              `${p.completed} of ${p.total} completed`
            ),
        }),
      { parentDir: cfg.workspaceParentDir, logger: log }
    );

    if (!directoryMode) {
      const failure = result.failures[0];
      if (failure) {
        err(failure.error.message);
        return EXIT_FAILURE;
      }
      for (const output of result.outputs) out(output.outputPath);
      return EXIT_OK;
    }

    out(formatSummary(result));
    for (const failure of result.failures) err(`  ${failure.error.message}`);
    if (result.cancelled) err("Batch was cancelled before every video was processed.");
    return result.failures.length > 0 ? EXIT_PARTIAL : EXIT_OK;
  } catch (e) {
    if (e instanceof TranscriberError) {
      err(e.message);
      return EXIT_FAILURE;
    }
    throw e;
  }
}

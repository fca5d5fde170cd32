import "dotenv/config";
import path from "node:path";
import os from "node:os";
import { z } from "zod";
import { DEFAULT_VIDEO_EXTENSIONS } from "./constants.js";
import { SetupError } from "./errors.js";

export interface AppConfig {
  apiKey?: string;
  geminiBaseUrl: string;
  ffmpegCmd: string;
  // finished videos go here; unset means beside each source
  outputDir?: string;
  workspaceParentDir: string;
  concurrency: number;
  // 0 disables the timeout
  commandTimeoutMs: number;
  transcribeTimeoutMs: number;
  videoExtensions: string[];
  logLevel: LogLevel;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().optional(),
  GOOGLE_API_KEY: z.string().trim().optional(),
  GEMINI_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com"),
  FFMPEG_CMD: z.string().default("ffmpeg"),
  OUTPUT_DIR: z.string().optional(),
  WORKSPACE_DIR: z.string().optional(),
  CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  TRANSCRIBE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  VIDEO_EXTENSIONS: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

/**
 * Normalise a comma separated allow-list to lower-case, dot-prefixed,
 * de-duplicated extensions.
 */
export function parseExtensions(list: string): string[] {
  const exts = list
    .split(",")
    .map((e) => e.trim().toLowerCase())
    .filter((e) => e.length > 0)
    .map((e) => (e.startsWith(".") ? e : `.${e}`));
  return [...new Set(exts)];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank values from .env files mean "not set"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SetupError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  const videoExtensions = vars.VIDEO_EXTENSIONS
    ? parseExtensions(vars.VIDEO_EXTENSIONS)
    : [...DEFAULT_VIDEO_EXTENSIONS];
  if (videoExtensions.length === 0) {
    throw new SetupError("Invalid configuration: VIDEO_EXTENSIONS lists no extensions");
  }

  return {
    apiKey: vars.GEMINI_API_KEY || vars.GOOGLE_API_KEY,
    geminiBaseUrl: vars.GEMINI_BASE_URL.replace(/\/+$/, ""),
    ffmpegCmd: vars.FFMPEG_CMD,
    outputDir: vars.OUTPUT_DIR ? path.resolve(vars.OUTPUT_DIR) : undefined,
    workspaceParentDir: vars.WORKSPACE_DIR ? path.resolve(vars.WORKSPACE_DIR) : os.tmpdir(),
    concurrency: vars.CONCURRENCY,
    commandTimeoutMs: vars.COMMAND_TIMEOUT_MS,
    transcribeTimeoutMs: vars.TRANSCRIBE_TIMEOUT_MS,
    videoExtensions,
    logLevel: vars.LOG_LEVEL,
  };
}

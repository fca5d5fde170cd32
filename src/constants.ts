/**
 * Centralized model configuration
 * Single source of truth for model variants and supported inputs
 */

// Valid model variants, cheapest first
export const MODEL_VARIANTS = ["flash", "pro"] as const;

export type ModelVariant = (typeof MODEL_VARIANTS)[number];

// Default variant to use across the application
export const DEFAULT_MODEL_VARIANT: ModelVariant = "flash";

export function isModelVariant(value: string): value is ModelVariant {
  return MODEL_VARIANTS.some((variant) => variant === value);
}

export function modelNameFor(variant: ModelVariant): string {
  return `gemini-3-${variant}-preview`;
}

export const DEFAULT_VIDEO_EXTENSIONS = [".mp4", ".mov", ".mkv", ".webm", ".avi"] as const;

export const OUTPUT_PREFIX = "transcribed_";

export const TRANSCRIBE_PROMPT = "Generate a transcript of the audio.";

// Gemini structured-output schema for the transcript reply
export const TRANSCRIPT_RESPONSE_SCHEMA = {
  type: "OBJECT",
  properties: {
    language: { type: "STRING" },
    segments: {
      type: "ARRAY",
      items: {
        type: "OBJECT",
        properties: {
          start: { type: "NUMBER" },
          end: { type: "NUMBER" },
          text: { type: "STRING" },
        },
        required: ["start", "end", "text"],
      },
    },
  },
  required: ["language", "segments"],
} as const;

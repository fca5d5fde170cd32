import fs from "node:fs/promises";
import path from "node:path";
import { fetch, type Dispatcher, type Response } from "undici";
import { z } from "zod";
import {
  TRANSCRIBE_PROMPT,
  TRANSCRIPT_RESPONSE_SCHEMA,
  modelNameFor,
} from "../constants.js";
import { TranscriptionError, errorMessage } from "../errors.js";
import { childLogger, type Logger } from "../utils/logger.js";
import type { TranscribeRequest, Transcriber, Transcript } from "../types.js";

export interface GeminiTranscriberOptions {
  apiKey: string;
  baseUrl?: string;
  // 0 or unset: no timeout per request
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export const TranscriptSchema = z.object({
  language: z.string(),
  segments: z.array(
    z
      .object({
        start: z.number().min(0),
        end: z.number().min(0),
        text: z.string(),
      })
      .refine((seg) => seg.start <= seg.end, { message: "segment start is after its end" })
  ),
});

const UploadResponseSchema = z.object({
  file: z.object({
    uri: z.string(),
    mimeType: z.string().optional(),
  }),
});

const GenerateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      })
    )
    .optional(),
});

interface UploadedFile {
  uri: string;
  mimeType: string;
}

function getAudioMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp3": "audio/mpeg",
    ".wav": "audio/wav",
    ".m4a": "audio/mp4",
    ".aac": "audio/aac",
    ".ogg": "audio/ogg",
    ".flac": "audio/flac",
  };
  return mimeTypes[ext] || "audio/mpeg";
}

/**
 * Parse the model's JSON reply into a Transcript, enforcing the response schema.
 */
export function parseTranscript(text: string): Transcript {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new TranscriptionError("transcription response is not valid JSON", { cause: err });
  }
  const parsed = TranscriptSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new TranscriptionError(`transcription response does not match schema: ${details}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Transcribes audio with the Gemini API: upload through the Files API, then
 * one generateContent call constrained to the transcript schema. No retries.
 */
export class GeminiTranscriber implements Transcriber {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly log: Logger;

  constructor(opts: GeminiTranscriberOptions) {
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl ?? "https://generativelanguage.googleapis.com").replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 0;
    this.dispatcher = opts.dispatcher;
    this.log = opts.logger ?? childLogger({ component: "gemini" });
  }

  async transcribe(req: TranscribeRequest): Promise<Transcript> {
    const model = modelNameFor(req.variant);
    const file = await this.upload(req.audioPath, req.signal);
    this.log.debug({ audioPath: req.audioPath, uri: file.uri }, "audio uploaded");

    const text = await this.generate(model, file, req.signal);
    const transcript = parseTranscript(text);
    this.log.debug(
      { audioPath: req.audioPath, model, language: transcript.language, segments: transcript.segments.length },
      "transcript received"
    );
    return transcript;
  }

  private signalFor(signal?: AbortSignal): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (signal) signals.push(signal);
    if (this.timeoutMs > 0) signals.push(AbortSignal.timeout(this.timeoutMs));
    if (signals.length <= 1) return signals[0];
    return AbortSignal.any(signals);
  }

  private async post(
    url: string,
    what: string,
    init: { headers: Record<string, string>; body: string | Uint8Array },
    signal?: AbortSignal
  ): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "x-goog-api-key": this.apiKey, ...init.headers },
        body: init.body,
        signal: this.signalFor(signal),
        dispatcher: this.dispatcher,
      });
    } catch (err) {
      throw new TranscriptionError(`${what} failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      const body = await res.text();
      const fatal =
        res.status === 401 || res.status === 403 || (res.status === 400 && body.includes("API_KEY_INVALID"));
      throw new TranscriptionError(`${what} failed: ${res.status} ${body}`, { fatal });
    }
    return res;
  }

  private async readJson(res: Response, what: string): Promise<unknown> {
    try {
      return await res.json();
    } catch (err) {
      throw new TranscriptionError(`${what} returned invalid JSON`, { cause: err });
    }
  }

  private async upload(audioPath: string, signal?: AbortSignal): Promise<UploadedFile> {
    let data: Buffer;
    try {
      data = await fs.readFile(audioPath);
    } catch (err) {
      throw new TranscriptionError(`failed to read audio ${audioPath}`, { cause: err });
    }
    const mimeType = getAudioMimeType(audioPath);

    // resumable protocol: "start" hands back the URL the bytes go to
    const start = await this.post(
      `${this.baseUrl}/upload/v1beta/files`,
      "audio upload",
      {
        headers: {
          "content-type": "application/json",
          "x-goog-upload-protocol": "resumable",
          "x-goog-upload-command": "start",
          "x-goog-upload-header-content-length": String(data.byteLength),
          "x-goog-upload-header-content-type": mimeType,
        },
        body: JSON.stringify({ file: { display_name: path.basename(audioPath) } }),
      },
      signal
    );
    const uploadUrl = start.headers.get("x-goog-upload-url");
    if (!uploadUrl) {
      throw new TranscriptionError("audio upload failed: no upload URL in response");
    }

    const res = await this.post(
      uploadUrl,
      "audio upload",
      {
        headers: {
          "x-goog-upload-offset": "0",
          "x-goog-upload-command": "upload, finalize",
        },
        body: data,
      },
      signal
    );
    const parsed = UploadResponseSchema.safeParse(await this.readJson(res, "audio upload"));
    if (!parsed.success) {
      throw new TranscriptionError("audio upload returned no file URI", { cause: parsed.error });
    }
    return { uri: parsed.data.file.uri, mimeType: parsed.data.file.mimeType ?? mimeType };
  }

  private async generate(model: string, file: UploadedFile, signal?: AbortSignal): Promise<string> {
    const res = await this.post(
      `${this.baseUrl}/v1beta/models/${model}:generateContent`,
      "transcript generation",
      {
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          contents: [
            {
              role: "user",
              parts: [
                { text: TRANSCRIBE_PROMPT },
                { fileData: { mimeType: file.mimeType, fileUri: file.uri } },
              ],
            },
          ],
          generationConfig: {
            responseMimeType: "application/json",
            responseSchema: TRANSCRIPT_RESPONSE_SCHEMA,
          },
        }),
      },
      signal
    );

    const parsed = GenerateResponseSchema.safeParse(await this.readJson(res, "transcript generation"));
    if (!parsed.success) {
      throw new TranscriptionError("transcript generation returned an unexpected payload", {
        cause: parsed.error,
      });
    }
    const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
    const text = parts.map((p) => p.text ?? "").join("");
    if (text.trim() === "") {
      throw new TranscriptionError("transcript generation returned no text");
    }
    return text;
  }
}

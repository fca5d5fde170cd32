import fs from "node:fs/promises";
import { FormatError } from "../errors.js";
import type { SubtitleFile, Transcript, TranscriptSegment } from "../types.js";

function pad2(n: number): string {
  return n.toString().padStart(2, "0");
}

function pad3(n: number): string {
  return n.toString().padStart(3, "0");
}

/**
 * Seconds -> `HH:MM:SS,mmm`. Rounds to the nearest millisecond first so
 * 186.4 renders as 06,400 and not 06,399.
 */
export function formatTimestamp(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new FormatError(`invalid timestamp: ${seconds}`);
  }
  const ms = Math.round(seconds * 1000);
  const h = Math.floor(ms / 3600000);
  const m = Math.floor((ms % 3600000) / 60000);
  const s = Math.floor((ms % 60000) / 1000);
  return `${pad2(h)}:${pad2(m)}:${pad2(s)},${pad3(ms % 1000)}`;
}

// an empty line inside a cue would end it early
function cueText(text: string): string {
  return text.trim().replace(/(\r?\n\s*)+/g, "\n");
}

function toCue(seg: TranscriptSegment, index: number): string {
  if (seg.start > seg.end) {
    throw new FormatError(`segment ${index} starts after it ends (${seg.start} > ${seg.end})`);
  }
  return `${index}\n${formatTimestamp(seg.start)} --> ${formatTimestamp(seg.end)}\n- ${cueText(seg.text)}\n`;
}

/**
 * Render segments as SRT cues in the order given, separated by blank lines.
 */
export function formatSrt(transcript: Transcript): string {
  return transcript.segments.map((seg, i) => toCue(seg, i + 1)).join("\n");
}

/**
 * Escape a path for ffmpeg's `subtitles=` filter, where ':' separates options
 * and '\' escapes. Backslashes go first so the colon escapes stay single.
 */
export function escapeFilterPath(filePath: string): string {
  return filePath.replaceAll("\\", "\\\\").replaceAll(":", "\\:");
}

export async function writeSubtitleFile(transcript: Transcript, outPath: string): Promise<SubtitleFile> {
  const content = formatSrt(transcript);
  try {
    await fs.writeFile(outPath, content, "utf-8");
  } catch (err) {
    throw new FormatError(`failed to write subtitles to ${outPath}`, { cause: err });
  }
  return { path: outPath, content, filterPath: escapeFilterPath(outPath) };
}

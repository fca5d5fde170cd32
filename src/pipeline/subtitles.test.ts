import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { describe, it, expect } from "vitest";
import { escapeFilterPath, formatSrt, formatTimestamp, writeSubtitleFile } from "./subtitles.js";
import { FormatError } from "../errors.js";

describe("formatTimestamp", () => {
  it.each([
    [0, "00:00:00,000"],
    [186.4, "00:03:06,400"],
    [3661.999, "01:01:01,999"],
    [59.9994, "00:00:59,999"],
    [59.9996, "00:01:00,000"],
    [7325.05, "02:02:05,050"],
    [360000, "100:00:00,000"],
  ])("%s -> %s", (seconds, expected) => {
    expect(formatTimestamp(seconds)).toBe(expected);
  });

  it("keeps hours of at least one for an hour and more", () => {
    expect(formatTimestamp(3661.999)).toMatch(/^(0[1-9]|[1-9]\d+):\d{2}:\d{2},\d{3}$/);
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])("rejects %s", (seconds) => {
    expect(() => formatTimestamp(seconds)).toThrow(FormatError);
  });
});

describe("formatSrt", () => {
  it("numbers cues from 1 and separates them with a blank line", () => {
    const srt = formatSrt({
      language: "en",
      segments: [
        { start: 0, end: 1.5, text: "Hello there" },
        { start: 1.5, end: 186.4, text: "  General Kenobi  " },
      ],
    });

    expect(srt).toBe(
      "1\n00:00:00,000 --> 00:00:01,500\n- Hello there\n" +
        "\n" +
        "2\n00:00:01,500 --> 00:03:06,400\n- General Kenobi\n"
    );
  });

  it("preserves the order it was given", () => {
    const srt = formatSrt({
      language: "en",
      segments: [
        { start: 10, end: 12, text: "second" },
        { start: 0, end: 2, text: "first" },
      ],
    });

    expect(srt.split("\n\n")).toEqual([
      "1\n00:00:10,000 --> 00:00:12,000\n- second",
      "2\n00:00:00,000 --> 00:00:02,000\n- first\n",
    ]);
  });

  it("collapses blank lines inside a segment", () => {
    const srt = formatSrt({
      language: "en",
      segments: [{ start: 0, end: 1, text: "line one\n\n\nline two" }],
    });

    expect(srt).toBe("1\n00:00:00,000 --> 00:00:01,000\n- line one\nline two\n");
  });

  it("renders an empty transcript as empty text", () => {
    expect(formatSrt({ language: "en", segments: [] })).toBe("");
  });

  it("rejects a segment that ends before it starts", () => {
    expect(() =>
      formatSrt({ language: "en", segments: [{ start: 5, end: 4, text: "backwards" }] })
    ).toThrow("segment 1 starts after it ends (5 > 4)");
  });
});

describe("escapeFilterPath", () => {
  it("escapes backslashes before colons", () => {
    expect(escapeFilterPath("C:\\clips\\a.srt")).toBe("C\\:\\\\clips\\\\a.srt");
  });

  it.each(["/tmp/work/0_a.mp4_subs.srt", "relative/file.srt", ""])(
    "leaves %j unchanged",
    (input) => {
      expect(escapeFilterPath(input)).toBe(input);
    }
  );

  it("escapes every colon", () => {
    expect(escapeFilterPath("/a:b/c:d.srt")).toBe("/a\\:b/c\\:d.srt");
  });
});

describe("writeSubtitleFile", () => {
  it("writes the cues as UTF-8 and returns the escaped filter path", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "subs-test-"));
    try {
      const out = path.join(dir, "0_clip.mp4_subs.srt");
      const file = await writeSubtitleFile(
        { language: "fr", segments: [{ start: 0, end: 2, text: "Ça va" }] },
        out
      );

      expect(file.path).toBe(out);
      expect(file.filterPath).toBe(escapeFilterPath(out));
      expect(await fs.readFile(out, "utf-8")).toBe("1\n00:00:00,000 --> 00:00:02,000\n- Ça va\n");
      expect(file.content).toBe("1\n00:00:00,000 --> 00:00:02,000\n- Ça va\n");
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("reports an unwritable destination as a FormatError", async () => {
    const out = path.join(os.tmpdir(), "no-such-dir-for-subs", "nested", "x.srt");

    await expect(
      writeSubtitleFile({ language: "en", segments: [] }, out)
    ).rejects.toThrow(FormatError);
  });
});

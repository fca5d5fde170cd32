import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { isSupportedVideo, resolveVideoPaths } from "./paths.js";
import { PathError, SetupError, UnsupportedFormatError } from "../errors.js";
import { DEFAULT_VIDEO_EXTENSIONS } from "../constants.js";

const extensions = DEFAULT_VIDEO_EXTENSIONS;

describe("isSupportedVideo", () => {
  it.each([
    ["clip.mp4", true],
    ["CLIP.MOV", true],
    ["a.b.mkv", true],
    ["talk.WebM", true],
    ["old.avi", true],
    ["notes.txt", false],
    ["audio.mp3", false],
    ["mp4", false],
    ["archive.mp4.zip", false],
  ])("%s -> %s", (name, expected) => {
    expect(isSupportedVideo(name, extensions)).toBe(expected);
  });

  it("follows the configured allow-list", () => {
    expect(isSupportedVideo("stream.ts", [".ts"])).toBe(true);
    expect(isSupportedVideo("clip.mp4", [".ts"])).toBe(false);
  });
});

describe("resolveVideoPaths", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "paths-test-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function touch(...parts: string[]) {
    const file = path.join(root, ...parts);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, "");
    return file;
  }

  it("returns a supported single file as an absolute path", async () => {
    const file = await touch("Talk.MP4");

    await expect(resolveVideoPaths(file, { extensions })).resolves.toEqual([file]);
  });

  it("rejects a single file with an unsupported extension", async () => {
    const file = await touch("notes.txt");

    const err = await resolveVideoPaths(file, { extensions }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UnsupportedFormatError);
    expect(err).toBeInstanceOf(SetupError);
    expect(err).toHaveProperty("extension", ".txt");
  });

  it("walks directories recursively in lexical order and filters by extension", async () => {
    const b = await touch("b.mov");
    const a = await touch("a.mp4");
    const nested = await touch("sub", "deeper", "c.MKV");
    await touch("sub", "readme.md");
    await touch("sub", "song.mp3");
    await fs.mkdir(path.join(root, "empty.mp4"));

    const result = await resolveVideoPaths(root, { extensions });

    expect(result).toEqual([a, b, nested].sort());
  });

  it("returns nothing for a directory without supported files", async () => {
    await touch("one.txt");
    await touch("inner", "two.wav");

    await expect(resolveVideoPaths(root, { extensions })).resolves.toEqual([]);
  });

  it("fails with PathError when the input does not exist", async () => {
    const missing = path.join(root, "missing");

    await expect(resolveVideoPaths(missing, { extensions })).rejects.toThrow(PathError);
    await expect(resolveVideoPaths(missing, { extensions })).rejects.toThrow(`${missing} does not exist`);
  });

  it("counts linked files and skips dangling links", async () => {
    const real = await touch("store", "real.mp4");
    await fs.symlink(real, path.join(root, "linked.mp4"));
    await fs.symlink(path.join(root, "gone.mp4"), path.join(root, "dangling.mp4"));

    const result = await resolveVideoPaths(root, { extensions });

    expect(result).toEqual([path.join(root, "linked.mp4"), real]);
  });

  it("fails with PathError when a linked file cannot be read", async () => {
    // a link cycle makes stat fail with ELOOP rather than ENOENT
    await fs.symlink(path.join(root, "b.mp4"), path.join(root, "a.mp4"));
    await fs.symlink(path.join(root, "a.mp4"), path.join(root, "b.mp4"));

    const err = await resolveVideoPaths(root, { extensions }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PathError);
    expect(err).toHaveProperty("cause.code", "ELOOP");
  });
});

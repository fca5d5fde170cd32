import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { destinationFor, placeOutput } from "./place.js";
import { PlacementError } from "../errors.js";

describe("destinationFor", () => {
  it("places the output beside the source by default", () => {
    expect(destinationFor("/videos/trip/day 1.mp4")).toBe("/videos/trip/transcribed_day 1.mp4");
  });

  it("uses the output directory when one is configured", () => {
    expect(destinationFor("/videos/trip/a.MOV", { outputDir: "/out" })).toBe("/out/transcribed_a.MOV");
  });

  it("keeps the folders below the source root under the output directory", () => {
    const opts = { outputDir: "/out", sourceRoot: "/videos" };

    expect(destinationFor("/videos/a/clip.mp4", opts)).toBe("/out/a/transcribed_clip.mp4");
    expect(destinationFor("/videos/b/c/clip.mp4", opts)).toBe("/out/b/c/transcribed_clip.mp4");
    expect(destinationFor("/videos/clip.mp4", opts)).toBe("/out/transcribed_clip.mp4");
  });

  it("falls back to the bare output directory for a source outside the root", () => {
    expect(destinationFor("/elsewhere/clip.mp4", { outputDir: "/out", sourceRoot: "/videos" })).toBe(
      "/out/transcribed_clip.mp4"
    );
    expect(destinationFor("/videos/..x/clip.mp4", { outputDir: "/out", sourceRoot: "/videos" })).toBe(
      "/out/..x/transcribed_clip.mp4"
    );
  });
});

describe("placeOutput", () => {
  let root: string;
  let artifact: string;
  let source: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "place-test-"));
    await fs.mkdir(path.join(root, "ws"));
    await fs.mkdir(path.join(root, "videos"));
    artifact = path.join(root, "ws", "0_transcribed_a.mp4");
    source = path.join(root, "videos", "a.mp4");
    await fs.writeFile(artifact, "burned");
    await fs.writeFile(source, "original");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("moves the artifact next to the source", async () => {
    const dest = await placeOutput(artifact, source);

    expect(dest).toBe(path.join(root, "videos", "transcribed_a.mp4"));
    expect(await fs.readFile(dest, "utf-8")).toBe("burned");
    expect(existsSync(artifact)).toBe(false);
    expect(await fs.readFile(source, "utf-8")).toBe("original");
  });

  it("creates the output directory when needed", async () => {
    const outputDir = path.join(root, "out", "nested");

    const dest = await placeOutput(artifact, source, { outputDir });

    expect(dest).toBe(path.join(outputDir, "transcribed_a.mp4"));
    expect(await fs.readFile(dest, "utf-8")).toBe("burned");
  });

  it("gives same-named sources from different folders their own outputs", async () => {
    const outputDir = path.join(root, "out");
    const sourceRoot = path.join(root, "videos");
    const first = path.join(sourceRoot, "a", "clip.mp4");
    const second = path.join(sourceRoot, "b", "clip.mp4");
    const firstArtifact = path.join(root, "ws", "0_transcribed_clip.mp4");
    const secondArtifact = path.join(root, "ws", "1_transcribed_clip.mp4");
    await fs.writeFile(firstArtifact, "burned a");
    await fs.writeFile(secondArtifact, "burned b");

    const firstDest = await placeOutput(firstArtifact, first, { outputDir, sourceRoot });
    const secondDest = await placeOutput(secondArtifact, second, { outputDir, sourceRoot });

    expect(firstDest).toBe(path.join(outputDir, "a", "transcribed_clip.mp4"));
    expect(secondDest).toBe(path.join(outputDir, "b", "transcribed_clip.mp4"));
    expect(await fs.readFile(firstDest, "utf-8")).toBe("burned a");
    expect(await fs.readFile(secondDest, "utf-8")).toBe("burned b");
  });

  it("replaces the output of an earlier run", async () => {
    const previous = path.join(root, "videos", "transcribed_a.mp4");
    await fs.writeFile(previous, "stale");

    await placeOutput(artifact, source);

    expect(await fs.readFile(previous, "utf-8")).toBe("burned");
  });

  it("refuses to replace a directory", async () => {
    await fs.mkdir(path.join(root, "videos", "transcribed_a.mp4"));

    const err = await placeOutput(artifact, source).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PlacementError);
    expect(err).toHaveProperty("stage", "placing");
    expect(existsSync(artifact)).toBe(true);
  });

  it("wraps a missing artifact in PlacementError", async () => {
    await fs.rm(artifact);

    await expect(placeOutput(artifact, source)).rejects.toThrow(
      `failed to place output at ${path.join(root, "videos", "transcribed_a.mp4")}`
    );
  });
});

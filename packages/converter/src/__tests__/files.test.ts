/**
 * Tests for filesystem helpers
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import {
  ensureDirectory,
  fileSizeMb,
  generateOutputPath,
  isVideoFile,
  pathExists,
  removeIfExists,
} from "../files.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "vidshift-files-"));
});

afterEach(async () => {
  await fs.promises.rm(dir, { recursive: true, force: true });
});

describe("files", () => {
  describe("isVideoFile", () => {
    test("matches known extensions in any case", () => {
      expect(isVideoFile("/videos/movie.mkv")).toBe(true);
      expect(isVideoFile("/videos/CLIP.MOV")).toBe(true);
      expect(isVideoFile("/videos/episode.m4v")).toBe(true);
    });

    test("rejects other files", () => {
      expect(isVideoFile("/videos/movie.srt")).toBe(false);
      expect(isVideoFile("/videos/mkv")).toBe(false);
    });
  });

  describe("generateOutputPath", () => {
    test("places the output next to the input by default", () => {
      expect(generateOutputPath("/videos/movie.mp4", null, "hevc")).toBe("/videos/movie_hevc.mkv");
    });

    test("uses the container of the target codec", () => {
      expect(generateOutputPath("/videos/movie.mkv", null, "h264")).toBe("/videos/movie_h264.mp4");
      expect(generateOutputPath("/videos/movie.mkv", null, "vp9")).toBe("/videos/movie_vp9.webm");
    });

    test("honors an output directory and suffix", () => {
      expect(generateOutputPath("/videos/movie.mp4", "/converted", "av1")).toBe("/converted/movie_av1.mkv");
      expect(generateOutputPath("/videos/movie.mp4", null, "av1", ".small")).toBe("/videos/movie.small.mkv");
    });
  });

  describe("filesystem operations", () => {
    test("creates nested directories", async () => {
      const nested = path.join(dir, "a", "b");
      await ensureDirectory(nested);
      expect(await pathExists(nested)).toBe(true);
    });

    test("reports file size in megabytes", async () => {
      const filePath = path.join(dir, "half.bin");
      await fs.promises.writeFile(filePath, Buffer.alloc(512 * 1024));
      expect(await fileSizeMb(filePath)).toBe(0.5);
    });

    test("removes a file once", async () => {
      const filePath = path.join(dir, "partial.mkv");
      await fs.promises.writeFile(filePath, "partial");

      expect(await removeIfExists(filePath)).toBe(true);
      expect(await removeIfExists(filePath)).toBe(false);
      expect(await pathExists(filePath)).toBe(false);
    });

    test("rethrows errors other than a missing file", async () => {
      await expect(removeIfExists(dir)).rejects.toThrow();
    });
  });
});

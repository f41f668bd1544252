/**
 * Tests for batch conversion
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeAll, beforeEach, describe, test, expect } from "vitest";
import type { BatchProgress, BatchTemplate } from "@vidshift/shared";
import { BatchConverter, discoverVideoFiles } from "../batch.js";
import { VideoConverter } from "../encoder.js";
import { setConsoleOutput } from "../logger.js";
import type { MediaInfo } from "../probe.js";
import { EngineSupervisor } from "../process.js";
import { EncoderSelector } from "../selector.js";
import {
  type EngineScript,
  FakeProber,
  PROGRESS_LINE,
  capabilities,
  fakeSpawn,
  mediaInfo,
} from "./helpers/fakes.js";

const TEMPLATE: BatchTemplate = { codec: "hevc", quality: null, preserveHdr: true, outputDir: null };

let dir: string;

async function createFiles(...names: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const name of names) {
    const filePath = path.join(dir, name);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, "source");
    files.push(filePath);
  }
  return files;
}

function setup(script: EngineScript, byPath: Record<string, MediaInfo> = {}, fallback: MediaInfo | null = mediaInfo()) {
  const { spawn, children } = fakeSpawn(script);
  const supervisor = new EngineSupervisor({
    readTimeout: 20,
    hangTimeout: 100,
    exitTimeout: 100,
    terminateTimeout: 50,
    spawn,
  });
  const prober = new FakeProber(byPath, fallback);
  const converter = new VideoConverter({
    selector: new EncoderSelector(capabilities("software")),
    prober,
    supervisor,
  });
  return { batch: new BatchConverter({ converter, prober }), prober, children };
}

beforeAll(() => {
  setConsoleOutput(false);
});

beforeEach(async () => {
  dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "vidshift-batch-"));
});

afterEach(async () => {
  await fs.promises.rm(dir, { recursive: true, force: true });
});

describe("BatchConverter", () => {
  describe("happy path", () => {
    test("converts every file and skips existing outputs", async () => {
      const files = await createFiles("a.mkv", "b.mkv", "c.mkv");
      await fs.promises.writeFile(path.join(dir, "b_hevc.mkv"), "earlier");
      const { batch, children } = setup((child) => child.exit(0));

      const result = await batch.convertMany(files, TEMPLATE);

      expect(result.total).toBe(3);
      expect(result.successful).toBe(2);
      expect(result.failed).toBe(0);
      expect(result.skipped).toBe(1);
      expect(result.cancelled).toBe(false);
      expect(result.files[1]).toEqual({
        status: "skipped",
        inputPath: files[1],
        outputPath: path.join(dir, "b_hevc.mkv"),
        skipReason: "output-exists",
      });
      expect(children.map((child) => child.outputPath)).toEqual([
        path.join(dir, "a_hevc.mkv"),
        path.join(dir, "c_hevc.mkv"),
      ]);
    });

    test("skips files already in the target codec without starting the engine", async () => {
      const files = await createFiles("a.mkv");
      const { batch, children } = setup((child) => child.exit(0), {
        [path.join(dir, "a.mkv")]: mediaInfo({ videoCodec: "hevc" }),
      });

      const result = await batch.convertMany(files, TEMPLATE);

      expect(result.skipped).toBe(1);
      expect(result.files[0]).toEqual({
        status: "skipped",
        inputPath: files[0],
        outputPath: "",
        skipReason: "already-target-codec",
      });
      expect(children).toHaveLength(0);
    });

    test("writes into the output directory, creating it first", async () => {
      const files = await createFiles("a.mkv");
      const outputDir = path.join(dir, "out", "hevc");
      const { batch, children } = setup((child) => child.exit(0));

      const result = await batch.convertMany(files, { ...TEMPLATE, outputDir, suffix: "" });

      expect(result.successful).toBe(1);
      expect(result.files[0]?.outputPath).toBe(path.join(outputDir, "a.mkv"));
      expect(children[0]?.outputPath).toBe(path.join(outputDir, "a.mkv"));
      expect(fs.existsSync(outputDir)).toBe(true);
    });

    test("reports progress with the file position", async () => {
      const files = await createFiles("a.mkv", "b.mkv");
      const { batch } = setup((child) => {
        child.writeStderr(`${PROGRESS_LINE}\n`);
        child.exit(0);
      });
      const updates: BatchProgress[] = [];

      await batch.convertMany(files, TEMPLATE, { onProgress: (update) => updates.push(update) });

      expect(updates.map(({ fileName, current, total }) => ({ fileName, current, total }))).toEqual([
        { fileName: "a.mkv", current: 1, total: 2 },
        { fileName: "b.mkv", current: 2, total: 2 },
      ]);
      expect(updates[0]?.progress.frame).toBe(240);
    });

    test("converts only files in the requested input codec", async () => {
      await createFiles("a.mkv", "nested/b.mp4", "notes.txt");
      const { batch, children } = setup((child) => child.exit(0), {
        [path.join(dir, "a.mkv")]: mediaInfo({ videoCodec: "h264" }),
        [path.join(dir, "nested", "b.mp4")]: mediaInfo({ videoCodec: "av1" }),
      });

      const result = await batch.convertDirectory(dir, TEMPLATE, { inputCodec: "h264" });

      expect(result.total).toBe(1);
      expect(result.successful).toBe(1);
      expect(children[0]?.outputPath).toBe(path.join(dir, "a_hevc.mkv"));
    });
  });

  describe("non-happy path", () => {
    test("counts engine failures and carries on", async () => {
      const files = await createFiles("a.mkv", "b.mkv");
      const { batch, children } = setup((child, call) => child.exit(call === 0 ? 1 : 0));

      const result = await batch.convertMany(files, TEMPLATE);

      expect(result.failed).toBe(1);
      expect(result.successful).toBe(1);
      expect(result.files.map((file) => file.status)).toEqual(["failed", "success"]);
      expect(children).toHaveLength(2);
    });

    test("records a probe failure as an error", async () => {
      const files = await createFiles("a.mkv", "b.mkv");
      const { batch } = setup((child) => child.exit(0), { [path.join(dir, "a.mkv")]: mediaInfo() }, null);

      const result = await batch.convertMany(files, TEMPLATE);

      expect(result.successful).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.files[1]).toEqual({
        status: "error",
        inputPath: files[1],
        outputPath: "",
        error: `Failed to probe "${files[1]}": no such file`,
      });
    });

    test("stops after the current file when cancelled", async () => {
      const files = await createFiles("a.mkv", "b.mkv", "c.mkv");
      const { batch, children } = setup((child) => {
        child.writeStderr(`${PROGRESS_LINE}\n`);
      });

      const result = await batch.convertMany(files, TEMPLATE, { onProgress: () => batch.cancel() });

      expect(result.cancelled).toBe(true);
      expect(result.files).toHaveLength(1);
      expect(result.files[0]?.status).toBe("failed");
      expect(children).toHaveLength(1);
    });

    test("cancels before the engine starts when cancelled while probing", async () => {
      const files = await createFiles("a.mkv", "b.mkv");
      const { batch, prober, children } = setup((child) => child.exit(0));
      prober.onProbe = () => batch.cancel();

      const result = await batch.convertMany(files, TEMPLATE);

      expect(result.cancelled).toBe(true);
      expect(result.files).toEqual([]);
      expect(prober.probed).toEqual([files[0]]);
      expect(children).toHaveLength(0);
    });

    test("keeps a cancel made while the converter probes", async () => {
      const files = await createFiles("a.mkv", "b.mkv");
      const { batch, prober, children } = setup((child) => child.exit(0));
      prober.onProbe = (_filePath, call) => {
        if (call === 1) batch.cancel();
      };

      const result = await batch.convertMany(files, TEMPLATE);

      expect(result.cancelled).toBe(true);
      expect(result.files).toEqual([
        { status: "failed", inputPath: files[0], outputPath: path.join(dir, "a_hevc.mkv") },
      ]);
      expect(result.failed).toBe(1);
      expect(children).toHaveLength(0);
    });

    test("does nothing when the signal is already aborted", async () => {
      const files = await createFiles("a.mkv");
      const controller = new AbortController();
      controller.abort();
      const { batch, prober, children } = setup((child) => child.exit(0));

      const result = await batch.convertMany(files, TEMPLATE, { signal: controller.signal });

      expect(result.cancelled).toBe(true);
      expect(result.files).toEqual([]);
      expect(prober.probed).toEqual([]);
      expect(children).toHaveLength(0);
    });
  });
});

describe("discoverVideoFiles", () => {
  test("finds video files recursively in sorted order", async () => {
    await createFiles("b.mkv", "a/c.MP4", "notes.txt", "cover.jpg");

    expect(await discoverVideoFiles(dir, new FakeProber())).toEqual([
      path.join(dir, "a", "c.MP4"),
      path.join(dir, "b.mkv"),
    ]);
  });

  test("leaves out files that cannot be probed when filtering by codec", async () => {
    await createFiles("a.mkv", "b.mkv");
    const prober = new FakeProber({ [path.join(dir, "a.mkv")]: mediaInfo({ videoCodec: "h264" }) }, null);

    expect(await discoverVideoFiles(dir, prober, "h264")).toEqual([path.join(dir, "a.mkv")]);
  });
});

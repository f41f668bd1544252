/**
 * Media probing through ffprobe's JSON output
 */

import type { SourceColorInfo } from "@vidshift/shared";
import { z } from "zod";
import { ProbeError, errorMessage } from "./errors.js";
import { runTool, type SpawnFn, spawnProcess } from "./exec.js";

export const DEFAULT_PROBE_TIMEOUT = 30000;

const HDR_TRANSFERS = ["smpte2084", "arib-std-b67"];
const HDR_SIDE_DATA = ["Mastering display metadata", "Content light level metadata"];

const streamSchema = z.object({
  index: z.number().optional(),
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  duration: z.string().optional(),
  color_primaries: z.string().optional(),
  color_transfer: z.string().optional(),
  color_space: z.string().optional(),
  color_range: z.string().optional(),
  side_data_list: z.array(z.object({ side_data_type: z.string().optional() })).optional(),
});

const probeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
  format: z
    .object({
      duration: z.string().optional(),
      size: z.string().optional(),
    })
    .optional(),
});

type ProbeStream = z.infer<typeof streamSchema>;
export type ProbeOutput = z.infer<typeof probeOutputSchema>;

export interface MediaInfo {
  videoCodec: string | null;
  duration: number | null; // seconds
  color: SourceColorInfo;
  hasHdr: boolean;
  fileSize: number; // bytes, 0 when not reported
  subtitleCount: number;
}

export interface MediaProber {
  probe(filePath: string): Promise<MediaInfo>;
}

function parsePositive(value: string | undefined): number | null {
  if (!value) return null;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function hasHdrMarkers(stream: ProbeStream): boolean {
  if (stream.color_transfer && HDR_TRANSFERS.includes(stream.color_transfer)) return true;
  if (stream.color_primaries === "bt2020") return true;
  return (stream.side_data_list ?? []).some(
    (data) => data.side_data_type !== undefined && HDR_SIDE_DATA.includes(data.side_data_type)
  );
}

/**
 * Reduce raw probe output to what the converter needs. Duration comes from
 * the container first and falls back to the video stream.
 */
export function summarizeProbeOutput(output: ProbeOutput): MediaInfo {
  const video = output.streams.find((stream) => stream.codec_type === "video");

  return {
    videoCodec: video?.codec_name ?? null,
    duration: parsePositive(output.format?.duration) ?? parsePositive(video?.duration),
    color: {
      primaries: video?.color_primaries ?? null,
      transfer: video?.color_transfer ?? null,
      space: video?.color_space ?? null,
      range: video?.color_range ?? null,
    },
    hasHdr: video ? hasHdrMarkers(video) : false,
    fileSize: parseInt(output.format?.size ?? "0", 10) || 0,
    subtitleCount: output.streams.filter((stream) => stream.codec_type === "subtitle").length,
  };
}

export function parseProbeOutput(filePath: string, stdout: string): MediaInfo {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (e) {
    throw new ProbeError(filePath, `invalid JSON (${errorMessage(e)})`, e);
  }

  const result = probeOutputSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new ProbeError(filePath, `unexpected output at ${issue?.path.join(".") ?? "root"}`);
  }
  return summarizeProbeOutput(result.data);
}

export interface FfprobeOptions {
  ffprobePath?: string;
  timeout?: number;
  spawn?: SpawnFn;
}

export class FfprobeMediaProber implements MediaProber {
  private readonly ffprobePath: string;
  private readonly timeout: number;
  private readonly spawnFn: SpawnFn;

  constructor(options: FfprobeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? "ffprobe";
    this.timeout = options.timeout ?? DEFAULT_PROBE_TIMEOUT;
    this.spawnFn = options.spawn ?? spawnProcess;
  }

  async probe(filePath: string): Promise<MediaInfo> {
    const result = await runTool(
      this.ffprobePath,
      ["-v", "quiet", "-print_format", "json", "-show_format", "-show_streams", filePath],
      this.timeout,
      this.spawnFn
    );

    if (result.error) {
      throw new ProbeError(filePath, `could not run ${this.ffprobePath}: ${result.error.message}`, result.error);
    }
    if (result.timedOut) {
      throw new ProbeError(filePath, `timed out after ${this.timeout}ms`);
    }
    if (result.exitCode !== 0) {
      throw new ProbeError(
        filePath,
        result.stderr.trim() || `exit code ${result.exitCode} (file may not exist or is inaccessible)`
      );
    }

    return parseProbeOutput(filePath, result.stdout);
  }
}

/**
 * Conversion requests, progress and results
 */

import type { BackendId, OutputCodec } from "./codec.js";

export interface ConversionRequest {
  inputPath: string;
  outputPath: string;
  codec: OutputCodec;
  quality: number | null; // null = backend default
  preserveHdr: boolean;
}

export interface ProgressSnapshot {
  frame: number;
  fps: number;
  bitrate: string; // as printed, e.g. "2510.3kbits/s"
  size: string; // as printed, e.g. "10240KiB"
  time: string; // HH:MM:SS
  elapsedSeconds: number;
  speed: number; // x realtime
  percentage: number; // 0-100, only moves when the total duration is known
}

export type ProgressListener = (progress: ProgressSnapshot) => void;

export interface BatchProgress {
  fileName: string;
  current: number; // 1-based position in the batch
  total: number;
  progress: ProgressSnapshot;
}

export type BatchProgressListener = (update: BatchProgress) => void;

export type ConversionStatus = "success" | "failed" | "skipped" | "error";

export type SkipReason = "already-target-codec" | "output-exists";

export interface ConversionOutcome {
  status: ConversionStatus;
  inputPath: string;
  outputPath: string; // empty when skipped before a destination was computed
  skipReason?: SkipReason;
  error?: string;
}

export interface BatchResult {
  total: number;
  successful: number;
  failed: number; // includes "error" outcomes
  skipped: number;
  cancelled: boolean;
  files: ConversionOutcome[];
}

export interface BatchTemplate {
  codec: OutputCodec;
  quality: number | null;
  preserveHdr: boolean;
  outputDir: string | null; // null = next to each input
  suffix?: string;
}

export type HdrDisposition = "preserved" | "lost" | "none";

/** What a conversion would do, computed without running it */
export interface ConversionPlan {
  inputPath: string;
  outputPath: string;
  inputCodec: string | null;
  codec: OutputCodec;
  backend: BackendId;
  encoder: string;
  hdr: HdrDisposition;
  skipReason: SkipReason | null;
  args: string[];
}

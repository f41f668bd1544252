/**
 * Capability Registry
 *
 * Static table of output codecs and, per codec, the encoder parameters of
 * each backend that can produce it. Every backend family speaks its own
 * option vocabulary, so parameter sets are a tagged union rather than one
 * record with optional fields.
 */

import type { BackendId, CodecDescriptor, OutputCodec } from "@vidshift/shared";
import { UnsupportedCodecError } from "./errors.js";

interface EncoderBase {
  encoder: string; // engine encoder name, e.g. "hevc_nvenc"
}

export interface NvencParameters extends EncoderBase {
  family: "nvenc";
  preset: string;
  rc: string;
  cq: number;
  bRefMode?: string;
  spatialAq: number;
  temporalAq: number;
}

export interface AmfParameters extends EncoderBase {
  family: "amf";
  quality: "speed" | "balanced" | "quality";
  rc: string;
  qp: number; // applied to I, P and B frames alike
}

export interface QsvParameters extends EncoderBase {
  family: "qsv";
  preset: string;
  globalQuality: number;
  lookAhead?: number;
}

export interface X264Parameters extends EncoderBase {
  family: "x264";
  preset: string;
  crf: number;
}

export interface X265Parameters extends EncoderBase {
  family: "x265";
  preset: string;
  crf: number;
  x265Params: string;
  hdrX265Params: string; // replaces x265Params when HDR is carried through
}

export interface SvtAv1Parameters extends EncoderBase {
  family: "svtav1";
  preset: number;
  crf: number;
}

export interface VpxParameters extends EncoderBase {
  family: "vpx";
  crf: number;
  deadline: "good" | "best" | "realtime";
  cpuUsed: number;
  rowMt: boolean;
}

export type HardwareParameterSet = NvencParameters | AmfParameters | QsvParameters;

export type SoftwareParameterSet =
  | X264Parameters
  | X265Parameters
  | SvtAv1Parameters
  | VpxParameters;

export type BackendParameterSet = HardwareParameterSet | SoftwareParameterSet;

export interface CodecEntry {
  descriptor: CodecDescriptor;
  backends: Partial<Record<Exclude<BackendId, "software">, HardwareParameterSet>> & {
    software: SoftwareParameterSet;
  };
}

// Backend probing order, also the order hardware backends are preferred in
export const HARDWARE_BACKENDS = ["nvidia", "amd", "intel"] as const;

export const OUTPUT_CODECS: Readonly<Record<OutputCodec, CodecEntry>> = {
  hevc: {
    descriptor: {
      key: "hevc",
      displayName: "H.265/HEVC",
      extension: ".mkv",
      supportsHdr: true,
      defaultQuality: 23,
      qualityRange: [1, 51],
    },
    backends: {
      nvidia: {
        family: "nvenc",
        encoder: "hevc_nvenc",
        preset: "p4",
        rc: "vbr",
        cq: 23,
        bRefMode: "middle",
        spatialAq: 1,
        temporalAq: 1,
      },
      amd: { family: "amf", encoder: "hevc_amf", quality: "balanced", rc: "cqp", qp: 23 },
      intel: { family: "qsv", encoder: "hevc_qsv", preset: "medium", globalQuality: 23, lookAhead: 1 },
      software: {
        family: "x265",
        encoder: "libx265",
        preset: "medium",
        crf: 23,
        x265Params: "repeat-headers=1",
        hdrX265Params: "hdr-opt=1:repeat-headers=1",
      },
    },
  },
  h264: {
    descriptor: {
      key: "h264",
      displayName: "H.264/AVC",
      extension: ".mp4",
      supportsHdr: false,
      defaultQuality: 23,
      qualityRange: [1, 51],
    },
    backends: {
      nvidia: {
        family: "nvenc",
        encoder: "h264_nvenc",
        preset: "p4",
        rc: "vbr",
        cq: 23,
        spatialAq: 1,
        temporalAq: 1,
      },
      amd: { family: "amf", encoder: "h264_amf", quality: "balanced", rc: "cqp", qp: 23 },
      intel: { family: "qsv", encoder: "h264_qsv", preset: "medium", globalQuality: 23, lookAhead: 1 },
      software: { family: "x264", encoder: "libx264", preset: "medium", crf: 23 },
    },
  },
  av1: {
    descriptor: {
      key: "av1",
      displayName: "AV1",
      extension: ".mkv",
      supportsHdr: true,
      defaultQuality: 30,
      qualityRange: [1, 63],
    },
    backends: {
      nvidia: {
        family: "nvenc",
        encoder: "av1_nvenc",
        preset: "p4",
        rc: "vbr",
        cq: 30,
        spatialAq: 1,
        temporalAq: 1,
      },
      amd: { family: "amf", encoder: "av1_amf", quality: "balanced", rc: "cqp", qp: 30 },
      intel: { family: "qsv", encoder: "av1_qsv", preset: "medium", globalQuality: 30 },
      software: { family: "svtav1", encoder: "libsvtav1", preset: 6, crf: 30 },
    },
  },
  vp9: {
    descriptor: {
      key: "vp9",
      displayName: "VP9",
      extension: ".webm",
      supportsHdr: false,
      defaultQuality: 30,
      qualityRange: [1, 63],
    },
    backends: {
      intel: { family: "qsv", encoder: "vp9_qsv", preset: "medium", globalQuality: 30 },
      software: {
        family: "vpx",
        encoder: "libvpx-vp9",
        crf: 30,
        deadline: "good",
        cpuUsed: 2,
        rowMt: true,
      },
    },
  },
};

// Display names for codec names reported by the probing tool
const INPUT_CODEC_NAMES: Record<string, string> = {
  av1: "AV1",
  hevc: "H.265/HEVC",
  h264: "H.264/AVC",
  vp9: "VP9",
  vp8: "VP8",
  mpeg4: "MPEG-4 Part 2",
  mpeg2video: "MPEG-2",
  prores: "Apple ProRes",
  dnxhd: "Avid DNxHD",
  theora: "Theora",
  wmv3: "Windows Media Video 9",
};

export function isOutputCodec(value: string): value is OutputCodec {
  return Object.prototype.hasOwnProperty.call(OUTPUT_CODECS, value);
}

export function listOutputCodecs(): OutputCodec[] {
  return Object.keys(OUTPUT_CODECS).filter(isOutputCodec);
}

export function mapOutputCodecs<T>(fn: (codec: OutputCodec) => T): Record<OutputCodec, T> {
  return { hevc: fn("hevc"), h264: fn("h264"), av1: fn("av1"), vp9: fn("vp9") };
}

function getEntry(codec: string): CodecEntry {
  if (!isOutputCodec(codec)) {
    throw new UnsupportedCodecError(codec);
  }
  return OUTPUT_CODECS[codec];
}

export function getCodecDescriptor(codec: string): CodecDescriptor {
  return getEntry(codec).descriptor;
}

/**
 * Parameter set for one (codec, backend) pair, or null when that backend has
 * no encoder registered for the codec. Unknown codecs throw.
 */
export function lookupParameters(codec: string, backend: BackendId): BackendParameterSet | null {
  const entry = getEntry(codec);
  if (backend === "software") {
    return entry.backends.software;
  }
  return entry.backends[backend] ?? null;
}

export function softwareParameters(codec: string): SoftwareParameterSet {
  return getEntry(codec).backends.software;
}

export function registeredBackends(codec: string): BackendId[] {
  const entry = getEntry(codec);
  const hardware = HARDWARE_BACKENDS.filter((backend) => entry.backends[backend] !== undefined);
  return [...hardware, "software"];
}

export function getCodecDisplayName(codec: string): string {
  if (isOutputCodec(codec)) {
    return OUTPUT_CODECS[codec].descriptor.displayName;
  }
  return INPUT_CODEC_NAMES[codec] ?? codec.toUpperCase();
}

export function isHardwareParameterSet(
  parameters: BackendParameterSet
): parameters is HardwareParameterSet {
  return parameters.family === "nvenc" || parameters.family === "amf" || parameters.family === "qsv";
}

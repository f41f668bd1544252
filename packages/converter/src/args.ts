/**
 * Engine argument builder
 *
 * Turns a conversion request plus the selected encoder into the argument
 * vector for the engine. Everything here is pure: source color metadata is
 * probed by the caller and passed in.
 */

import type { ConversionRequest, HardwareBackend, HdrKind, SourceColorInfo } from "@vidshift/shared";
import { getCodecDescriptor, type BackendParameterSet } from "./registry.js";
import type { EncoderSelection } from "./selector.js";

export interface ColorParams {
  primaries: string;
  transfer: string;
  space: string;
  range: string;
}

export const HDR10_COLOR: Readonly<ColorParams> = Object.freeze({
  primaries: "bt2020",
  transfer: "smpte2084",
  space: "bt2020nc",
  range: "tv",
});

export const HLG_COLOR: Readonly<ColorParams> = Object.freeze({
  primaries: "bt2020",
  transfer: "arib-std-b67",
  space: "bt2020nc",
  range: "tv",
});

// NVENC signals HLG poorly, HLG sources get HDR10 tags there instead
const HLG_INCOMPATIBLE: readonly HardwareBackend[] = ["nvidia"];

export interface ColorResolution {
  kind: HdrKind | null; // null when nothing was detected
  params: ColorParams;
  narrowed: boolean; // HLG replaced by HDR10 for this backend
}

export function classifyTransfer(transfer: string | null): HdrKind {
  const value = (transfer ?? "").toLowerCase();
  if (value.includes("arib-std-b67") || value.includes("hlg")) return "hlg";
  if (value.includes("smpte2084") || value.includes("pq")) return "hdr10";
  return "other";
}

/**
 * Explicit color tags for a hardware encoder, which cannot copy them from
 * the source the way software encoders do.
 */
export function resolveHdrColorParams(
  backend: HardwareBackend,
  color: SourceColorInfo | null
): ColorResolution {
  if (!color) {
    return { kind: null, params: { ...HDR10_COLOR }, narrowed: false };
  }

  const kind = classifyTransfer(color.transfer);
  switch (kind) {
    case "hlg":
      if (HLG_INCOMPATIBLE.includes(backend)) {
        return { kind, params: { ...HDR10_COLOR }, narrowed: true };
      }
      return { kind, params: { ...HLG_COLOR }, narrowed: false };
    case "hdr10":
      return { kind, params: { ...HDR10_COLOR }, narrowed: false };
    case "other":
      return {
        kind,
        params: {
          primaries: color.primaries ?? HDR10_COLOR.primaries,
          transfer: color.transfer ?? HDR10_COLOR.transfer,
          space: color.space ?? HDR10_COLOR.space,
          range: color.range ?? HDR10_COLOR.range,
        },
        narrowed: false,
      };
  }
}

/**
 * Rate control and quality flags for one backend family. `quality`
 * replaces only the quality-bearing value of the parameter set.
 */
export function buildQualityArgs(
  parameters: BackendParameterSet,
  quality: number | null,
  hdr = false
): string[] {
  switch (parameters.family) {
    case "nvenc": {
      const args = ["-preset", parameters.preset, "-rc", parameters.rc, "-cq", String(quality ?? parameters.cq)];
      if (parameters.bRefMode) {
        args.push("-b_ref_mode", parameters.bRefMode);
      }
      args.push("-spatial_aq", String(parameters.spatialAq), "-temporal_aq", String(parameters.temporalAq));
      return args;
    }
    case "amf": {
      const qp = String(quality ?? parameters.qp);
      return ["-quality", parameters.quality, "-rc", parameters.rc, "-qp_i", qp, "-qp_p", qp, "-qp_b", qp];
    }
    case "qsv": {
      const args = ["-preset", parameters.preset, "-global_quality", String(quality ?? parameters.globalQuality)];
      if (parameters.lookAhead !== undefined) {
        args.push("-look_ahead", String(parameters.lookAhead));
      }
      return args;
    }
    case "x264":
      return ["-preset", parameters.preset, "-crf", String(quality ?? parameters.crf)];
    case "x265":
      return [
        "-preset",
        parameters.preset,
        "-crf",
        String(quality ?? parameters.crf),
        "-x265-params",
        hdr ? parameters.hdrX265Params : parameters.x265Params,
      ];
    case "svtav1":
      return ["-preset", String(parameters.preset), "-crf", String(quality ?? parameters.crf)];
    case "vpx":
      // -b:v 0 puts libvpx in constant quality mode
      return [
        "-crf",
        String(quality ?? parameters.crf),
        "-b:v",
        "0",
        "-deadline",
        parameters.deadline,
        "-cpu-used",
        String(parameters.cpuUsed),
        "-row-mt",
        parameters.rowMt ? "1" : "0",
      ];
  }
}

function colorArgs(params: ColorParams): string[] {
  return [
    "-color_primaries",
    params.primaries,
    "-color_trc",
    params.transfer,
    "-colorspace",
    params.space,
    "-color_range",
    params.range,
  ];
}

/**
 * Whether a request will carry HDR signalling with this selection
 */
export function carriesHdr(request: ConversionRequest, selection: EncoderSelection): boolean {
  return request.preserveHdr && getCodecDescriptor(selection.codec).supportsHdr;
}

/**
 * Full engine argument vector:
 * -y -i <input> -c:v <encoder> <quality> [color] -c:a copy <mapping> <output>
 */
export function buildConversionArgs(
  request: ConversionRequest,
  selection: EncoderSelection,
  sourceColor: SourceColorInfo | null = null
): string[] {
  const hdr = carriesHdr(request, selection);
  const args = ["-y", "-i", request.inputPath, "-c:v", selection.parameters.encoder];

  args.push(...buildQualityArgs(selection.parameters, request.quality, hdr));

  if (hdr) {
    if (selection.backend === "software") {
      args.push(...colorArgs({ primaries: "copy", transfer: "copy", space: "copy", range: "copy" }));
    } else {
      args.push(...colorArgs(resolveHdrColorParams(selection.backend, sourceColor).params));
    }
    args.push("-map_metadata", "0");
    if (selection.backend === "software") {
      args.push("-movflags", "+write_colr");
    }
  }

  args.push("-c:a", "copy");

  if (selection.backend === "software") {
    args.push("-c:s", "copy", "-map", "0");
  } else {
    // Hardware encoders get only the first video stream and any audio
    args.push("-map", "0:v:0", "-map", "0:a?");
  }

  args.push(request.outputPath);
  return args;
}

const SAFE_ARG = /^[\w@%+=:,./-]+$/;

function quoteArg(arg: string): string {
  if (arg !== "" && SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command line for logs and dry runs
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

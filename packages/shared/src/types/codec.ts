/**
 * Codec and encoder backend identifiers
 */

export type OutputCodec = "hevc" | "h264" | "av1" | "vp9";

/**
 * Encoding implementation family. "software" is always available; the others
 * depend on the GPU vendor and on how the engine was built.
 */
export type BackendId = "nvidia" | "amd" | "intel" | "software";

export type HardwareBackend = Exclude<BackendId, "software">;

export interface CodecDescriptor {
  key: OutputCodec;
  displayName: string;
  extension: string; // container used when this codec is the output, e.g. ".mkv"
  supportsHdr: boolean;
  defaultQuality: number;
  qualityRange: readonly [min: number, max: number];
}

/**
 * Result of probing the engine once for its encoder list.
 * Treated as read-only for the lifetime of the selector that owns it.
 */
export interface HardwareCapabilities {
  detected: BackendId;
  available: Readonly<Record<OutputCodec, readonly BackendId[]>>;
}

export type HdrKind = "hlg" | "hdr10" | "other";

/** Stream-level color metadata as reported by the probing tool */
export interface SourceColorInfo {
  primaries: string | null;
  transfer: string | null;
  space: string | null;
  range: string | null;
}

/**
 * Option values shared by the convert and batch commands
 */

import type { OutputCodec } from "@vidshift/shared";
import type { CliArgs } from "../cli.js";
import { UsageError } from "../errors.js";
import { getCodecDescriptor, isOutputCodec, listOutputCodecs } from "../registry.js";

export const DEFAULT_CODEC: OutputCodec = "hevc";

export function resolveCodec(args: CliArgs): OutputCodec {
  const codec = args.flags.codec ?? DEFAULT_CODEC;
  if (!isOutputCodec(codec)) {
    throw new UsageError(`Unknown codec "${codec}". Choose one of: ${listOutputCodecs().join(", ")}`);
  }
  return codec;
}

/**
 * Quality override, or null for the encoder's default
 */
export function resolveQuality(args: CliArgs, codec: OutputCodec): number | null {
  const raw = args.flags.quality;
  if (raw === undefined) {
    return null;
  }

  const [min, max] = getCodecDescriptor(codec).qualityRange;
  const quality = Number(raw);
  if (!Number.isInteger(quality) || quality < min || quality > max) {
    throw new UsageError(`Quality for ${codec} must be an integer from ${min} to ${max}, got "${raw}"`);
  }
  return quality;
}

export function requireTarget(args: CliArgs, what: string): string {
  if (!args.target) {
    throw new UsageError(`Missing ${what}. Run 'vidshift --help' for usage information`);
  }
  return args.target;
}

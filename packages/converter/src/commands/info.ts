/**
 * Info Command
 *
 * Reports the tool versions, detected hardware and the encoder each output
 * codec would use.
 */

import { getConfig } from "../config.js";
import type { SpawnFn } from "../exec.js";
import { detectHardware, summarizeCapabilities } from "../gpu.js";
import { getCodecDescriptor, listOutputCodecs } from "../registry.js";
import { EncoderSelector } from "../selector.js";
import { validateEnvironment } from "../validation.js";

export async function info(options: { spawn?: SpawnFn } = {}): Promise<number> {
  const config = getConfig();

  const validation = await validateEnvironment(config, options.spawn);
  console.log(`\nFFmpeg:  ${validation.ffmpegVersion ?? "not available"}`);
  console.log(`FFprobe: ${config.ffprobePath}`);

  const capabilities = await detectHardware({
    ffmpegPath: config.ffmpegPath,
    timeout: config.detectTimeout,
    spawn: options.spawn,
  });
  console.log("");
  for (const line of summarizeCapabilities(capabilities)) {
    console.log(line);
  }

  const selector = new EncoderSelector(capabilities);
  console.log(`\nSelected encoders${config.preferGpu ? "" : " (GPU disabled)"}:`);
  for (const codec of listOutputCodecs()) {
    const selection = selector.select(codec, config.preferGpu);
    const descriptor = getCodecDescriptor(codec);
    const [min, max] = descriptor.qualityRange;
    console.log(
      `  ${codec.padEnd(5)} ${selection.parameters.encoder.padEnd(12)} ${descriptor.extension.padEnd(6)} quality ${descriptor.defaultQuality} (${min}-${max})${descriptor.supportsHdr ? ", HDR" : ""}`
    );
  }

  if (validation.warnings.length > 0) {
    console.log("\nWarnings:");
    for (const warning of validation.warnings) {
      console.log(`  - ${warning}`);
    }
  }
  if (!validation.valid) {
    console.error("\nErrors:");
    for (const error of validation.errors) {
      console.error(`  - ${error}`);
    }
    return 1;
  }
  return 0;
}

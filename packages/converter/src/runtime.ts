/**
 * Wires the conversion engine together from configuration
 */

import { BatchConverter } from "./batch.js";
import type { ConverterConfig } from "./config.js";
import { VideoConverter } from "./encoder.js";
import type { SpawnFn } from "./exec.js";
import { FfprobeMediaProber, type MediaProber } from "./probe.js";
import { EngineSupervisor } from "./process.js";
import { EncoderSelector } from "./selector.js";

export interface Runtime {
  preferGpu: boolean;
  selector: EncoderSelector;
  prober: MediaProber;
  supervisor: EngineSupervisor;
  converter: VideoConverter;
  batch: BatchConverter;
}

export interface RuntimeOptions {
  cpuOnly?: boolean;
  spawn?: SpawnFn;
}

export async function createRuntime(
  config: ConverterConfig,
  options: RuntimeOptions = {}
): Promise<Runtime> {
  const preferGpu = config.preferGpu && !options.cpuOnly;

  const selector = await EncoderSelector.create({
    ffmpegPath: config.ffmpegPath,
    timeout: config.detectTimeout,
    spawn: options.spawn,
  });
  const prober = new FfprobeMediaProber({
    ffprobePath: config.ffprobePath,
    timeout: config.probeTimeout,
    spawn: options.spawn,
  });
  const supervisor = new EngineSupervisor({
    ffmpegPath: config.ffmpegPath,
    hangTimeout: config.hangTimeout,
    spawn: options.spawn,
  });
  const converter = new VideoConverter({ selector, prober, supervisor, preferGpu });
  const batch = new BatchConverter({ converter, prober });

  return { preferGpu, selector, prober, supervisor, converter, batch };
}

/**
 * GPU Detection
 *
 * Asks the engine once for its encoder list and works out which hardware
 * backends can produce each output codec. Detection never fails: anything
 * that goes wrong leaves the converter on software encoding.
 */

import type { BackendId, HardwareCapabilities, HardwareBackend, OutputCodec } from "@vidshift/shared";
import { runTool, type SpawnFn, spawnProcess } from "./exec.js";
import { createLogger } from "./logger.js";
import {
  HARDWARE_BACKENDS,
  OUTPUT_CODECS,
  getCodecDisplayName,
  listOutputCodecs,
  mapOutputCodecs,
} from "./registry.js";

const logger = createLogger("Detect");

export const DEFAULT_DETECT_TIMEOUT = 10000;

export interface DetectOptions {
  ffmpegPath?: string;
  timeout?: number;
  spawn?: SpawnFn;
}

function freeze(
  detected: BackendId,
  available: Record<OutputCodec, BackendId[]>
): HardwareCapabilities {
  return Object.freeze({
    detected,
    available: Object.freeze(mapOutputCodecs((codec) => Object.freeze([...available[codec]]))),
  });
}

export function softwareOnlyCapabilities(): HardwareCapabilities {
  return freeze(
    "software",
    mapOutputCodecs((): BackendId[] => ["software"])
  );
}

/**
 * Build capabilities from the text of `ffmpeg -encoders`.
 *
 * The listing is free text, one encoder per line, so a backend counts as
 * available for a codec when its encoder name occurs anywhere in it.
 */
export function parseEncoderListing(listing: string): HardwareCapabilities {
  const found = new Set<HardwareBackend>();

  const available = mapOutputCodecs((codec) => {
    const { backends } = OUTPUT_CODECS[codec];
    const usable: BackendId[] = [];
    for (const backend of HARDWARE_BACKENDS) {
      const parameters = backends[backend];
      if (parameters && listing.includes(parameters.encoder)) {
        usable.push(backend);
        found.add(backend);
      }
    }
    usable.push("software");
    return usable;
  });

  // HEVC support decides the vendor first; any other listed encoder second
  const detected =
    HARDWARE_BACKENDS.find((backend) => available.hevc.includes(backend)) ??
    HARDWARE_BACKENDS.find((backend) => found.has(backend)) ??
    "software";

  return freeze(detected, available);
}

/**
 * Probe the engine for hardware encoders
 */
export async function detectHardware(options: DetectOptions = {}): Promise<HardwareCapabilities> {
  const ffmpegPath = options.ffmpegPath ?? "ffmpeg";
  const timeout = options.timeout ?? DEFAULT_DETECT_TIMEOUT;

  const result = await runTool(
    ffmpegPath,
    ["-hide_banner", "-encoders"],
    timeout,
    options.spawn ?? spawnProcess
  );

  if (result.timedOut) {
    logger.warn(`Encoder listing timed out after ${timeout}ms, falling back to software encoding`);
    return softwareOnlyCapabilities();
  }
  if (result.error) {
    logger.warn(`Could not run ${ffmpegPath}: ${result.error.message}, falling back to software encoding`);
    return softwareOnlyCapabilities();
  }
  if (result.exitCode !== 0) {
    logger.warn(`${ffmpegPath} -encoders exited with code ${result.exitCode}, falling back to software encoding`);
    return softwareOnlyCapabilities();
  }

  const capabilities = parseEncoderListing(result.stdout);
  if (capabilities.detected === "software") {
    logger.info("No GPU encoders detected, using software encoding");
  } else {
    logger.info(`${capabilities.detected.toUpperCase()} GPU encoder detected`);
  }
  return capabilities;
}

/**
 * Human-readable capability report
 */
export function summarizeCapabilities(capabilities: HardwareCapabilities): string[] {
  const lines: string[] = [
    `Detected backend: ${capabilities.detected}`,
    "",
    "Encoders per output codec:",
  ];

  for (const codec of listOutputCodecs()) {
    const { backends } = OUTPUT_CODECS[codec];
    const encoders = capabilities.available[codec].map((backend) => {
      const parameters = backend === "software" ? backends.software : backends[backend];
      return parameters ? `${parameters.encoder} (${backend})` : backend;
    });
    lines.push(`  ${getCodecDisplayName(codec).padEnd(12)} ${encoders.join(", ")}`);
  }

  return lines;
}

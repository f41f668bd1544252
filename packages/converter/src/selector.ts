/**
 * Encoder Configuration Selector
 *
 * Picks the backend for a target codec from capabilities detected once at
 * construction. Selection is a pure function of those capabilities and the
 * registry, so dry-run previews match what a real conversion would use.
 */

import type { BackendId, HardwareCapabilities, OutputCodec } from "@vidshift/shared";
import { type DetectOptions, detectHardware } from "./gpu.js";
import { createLogger } from "./logger.js";
import {
  type BackendParameterSet,
  getCodecDescriptor,
  lookupParameters,
  softwareParameters,
} from "./registry.js";

const logger = createLogger("Selector");

export interface EncoderSelection {
  codec: OutputCodec;
  backend: BackendId;
  parameters: BackendParameterSet;
  hardware: boolean;
}

export class EncoderSelector {
  constructor(private readonly detected: HardwareCapabilities) {}

  /**
   * Detect hardware and build a selector. Call again to re-detect.
   */
  static async create(options: DetectOptions = {}): Promise<EncoderSelector> {
    return new EncoderSelector(await detectHardware(options));
  }

  get capabilities(): HardwareCapabilities {
    return this.detected;
  }

  select(codec: string, preferGpu = true): EncoderSelection {
    const { key } = getCodecDescriptor(codec);
    const backend = this.chooseBackend(key, preferGpu);

    if (backend !== "software") {
      const parameters = lookupParameters(key, backend);
      if (parameters) {
        return { codec: key, backend, parameters, hardware: true };
      }
      logger.warn(`No ${backend} encoder registered for ${key}, using software encoding`);
    }

    return { codec: key, backend: "software", parameters: softwareParameters(key), hardware: false };
  }

  /**
   * The detected vendor is only used when the per-codec probe confirmed it
   */
  private chooseBackend(codec: OutputCodec, preferGpu: boolean): BackendId {
    const { detected, available } = this.detected;
    if (preferGpu && detected !== "software" && available[codec].includes(detected)) {
      return detected;
    }
    return "software";
  }
}

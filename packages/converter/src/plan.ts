/**
 * Dry-run planning: what a conversion would do, without doing it
 */

import type { BatchTemplate, ConversionPlan, ConversionRequest, HdrDisposition } from "@vidshift/shared";
import { buildConversionArgs, carriesHdr } from "./args.js";
import { errorMessage } from "./errors.js";
import { generateOutputPath, pathExists } from "./files.js";
import { createLogger } from "./logger.js";
import type { MediaInfo, MediaProber } from "./probe.js";
import type { EncoderSelector } from "./selector.js";

const logger = createLogger("Plan");

export interface PlanDependencies {
  selector: EncoderSelector;
  prober: MediaProber;
  preferGpu?: boolean;
  outputPath?: string; // explicit destination instead of one derived from the template
}

export async function planConversion(
  inputPath: string,
  template: BatchTemplate,
  deps: PlanDependencies
): Promise<ConversionPlan> {
  let info: MediaInfo | null = null;
  try {
    info = await deps.prober.probe(inputPath);
  } catch (e) {
    logger.warn(errorMessage(e));
  }

  const outputPath =
    deps.outputPath ?? generateOutputPath(inputPath, template.outputDir, template.codec, template.suffix);
  const selection = deps.selector.select(template.codec, deps.preferGpu ?? true);

  const request: ConversionRequest = {
    inputPath,
    outputPath,
    codec: template.codec,
    quality: template.quality,
    preserveHdr: template.preserveHdr,
  };

  const inputCodec = info?.videoCodec ?? null;
  let skipReason: ConversionPlan["skipReason"] = null;
  if (inputCodec === template.codec) {
    skipReason = "already-target-codec";
  } else if (await pathExists(outputPath)) {
    skipReason = "output-exists";
  }

  const hdrCarried = carriesHdr(request, selection);
  let hdr: HdrDisposition = "none";
  if (info?.hasHdr) {
    hdr = hdrCarried ? "preserved" : "lost";
  }

  const sourceColor = selection.hardware && hdrCarried ? (info?.color ?? null) : null;

  return {
    inputPath,
    outputPath,
    inputCodec,
    codec: template.codec,
    backend: selection.backend,
    encoder: selection.parameters.encoder,
    hdr,
    skipReason,
    args: buildConversionArgs(request, selection, sourceColor),
  };
}

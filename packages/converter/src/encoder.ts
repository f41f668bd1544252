/**
 * Single-file Video Converter
 *
 * One conversion attempt end to end: probe the source, pick an encoder,
 * build the command, run it under supervision. A GPU run that fails while
 * carrying HDR tags is retried once without them.
 */

import * as path from "node:path";
import type { ConversionRequest, ProgressListener } from "@vidshift/shared";
import { buildConversionArgs, carriesHdr, formatCommand, resolveHdrColorParams } from "./args.js";
import { errorMessage } from "./errors.js";
import { fileSizeMb, pathExists, removeIfExists } from "./files.js";
import { createLogger } from "./logger.js";
import type { MediaInfo, MediaProber } from "./probe.js";
import type { EngineSupervisor, RunResult } from "./process.js";
import { getCodecDisplayName } from "./registry.js";
import type { EncoderSelection, EncoderSelector } from "./selector.js";

const logger = createLogger("Encoder");

const BYTES_PER_MB = 1024 * 1024;

// Result for a run cancelled before the engine started
function cancelledBeforeStart(): RunResult {
  return { success: false, exitCode: null, signal: null, reason: "cancelled", invalidArgument: false, stderrTail: [] };
}

export interface ConverterDependencies {
  selector: EncoderSelector;
  prober: MediaProber;
  supervisor: EngineSupervisor;
  preferGpu?: boolean;
}

export interface ConvertOptions {
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

/**
 * Rough wall-clock estimate from file size. GPU encoding runs about four
 * times faster than software.
 */
export function estimateConversionTime(fileSizeMb: number, hardware: boolean): string {
  const minutesPerGb = hardware ? 2 : 8;
  const minutes = (fileSizeMb / 1024) * minutesPerGb;

  if (minutes < 1) return "< 1 minute";
  if (minutes < 60) return `~${Math.floor(minutes)} minutes`;
  return `~${Math.floor(minutes / 60)}h ${Math.floor(minutes % 60)}m`;
}

export class VideoConverter {
  private readonly selector: EncoderSelector;
  private readonly prober: MediaProber;
  private readonly supervisor: EngineSupervisor;
  private readonly preferGpu: boolean;
  private cancelRequested = false;

  constructor(deps: ConverterDependencies) {
    this.selector = deps.selector;
    this.prober = deps.prober;
    this.supervisor = deps.supervisor;
    this.preferGpu = deps.preferGpu ?? true;
  }

  /**
   * Encoder that a conversion to this codec would use
   */
  selectionFor(codec: string): EncoderSelection {
    return this.selector.select(codec, this.preferGpu);
  }

  /**
   * Cancel the conversion in flight, including a pending HDR retry
   */
  cancel(): void {
    this.cancelRequested = true;
    this.supervisor.cancel();
  }

  async convertOne(request: ConversionRequest, options: ConvertOptions = {}): Promise<boolean> {
    this.cancelRequested = false;
    const inputName = path.basename(request.inputPath);

    if (!(await pathExists(request.inputPath))) {
      logger.error(`Input file not found: ${request.inputPath}`);
      return false;
    }
    if (this.isCancelled(options)) {
      logger.warn(`Conversion cancelled: ${inputName}`);
      return false;
    }

    let info: MediaInfo;
    try {
      info = await this.prober.probe(request.inputPath);
    } catch (e) {
      logger.error(errorMessage(e));
      return false;
    }
    if (this.isCancelled(options)) {
      logger.warn(`Conversion cancelled: ${inputName}`);
      return false;
    }
    if (!info.videoCodec) {
      logger.error(`Could not detect a video codec in ${inputName}`);
      return false;
    }
    if (info.videoCodec === request.codec) {
      logger.warn(`${inputName} is already ${getCodecDisplayName(request.codec)}, re-encoding anyway`);
    }

    const selection = this.selectionFor(request.codec);
    if (selection.hardware && info.subtitleCount > 0) {
      logger.warn(
        `${info.subtitleCount} subtitle stream(s) in ${inputName} will not be carried by ${selection.parameters.encoder}`
      );
    }

    try {
      const success = await this.runWithFallback(request, selection, info, options);
      if (success) {
        await this.logCompletion(request);
      } else if (this.isCancelled(options)) {
        logger.warn(`Conversion cancelled: ${inputName}`);
        await this.discardOutput(request.outputPath);
      } else {
        logger.error(`Conversion failed: ${inputName}`);
        await this.discardOutput(request.outputPath);
      }
      return success;
    } catch (e) {
      await this.discardOutput(request.outputPath);
      throw e;
    }
  }

  private async runWithFallback(
    request: ConversionRequest,
    selection: EncoderSelection,
    info: MediaInfo,
    options: ConvertOptions
  ): Promise<boolean> {
    const sizeMb = info.fileSize > 0 ? info.fileSize / BYTES_PER_MB : await fileSizeMb(request.inputPath);
    const hdr = carriesHdr(request, selection) && info.hasHdr ? "with HDR" : "SDR";
    logger.info(`Converting ${path.basename(request.inputPath)} (${sizeMb.toFixed(1)} MB) ${hdr}`);
    logger.info(
      `Using ${selection.parameters.encoder} encoder (${getCodecDisplayName(info.videoCodec ?? "")} -> ${getCodecDisplayName(selection.codec)})`
    );
    logger.info(`Estimated time: ${estimateConversionTime(sizeMb, selection.hardware)}`);

    const result = await this.attempt(request, selection, info, options);
    if (result.success) {
      return true;
    }

    const retryable =
      result.reason !== "cancelled" &&
      !this.isCancelled(options) &&
      selection.hardware &&
      carriesHdr(request, selection);
    if (!retryable) {
      return false;
    }

    logger.warn("Conversion failed with HDR parameters, trying fallback without HDR...");
    await removeIfExists(request.outputPath);

    const fallback = await this.attempt({ ...request, preserveHdr: false }, selection, info, options);
    if (fallback.success) {
      logger.info("Conversion succeeded with fallback (no HDR preservation)");
      return true;
    }
    logger.error("Conversion failed even with fallback");
    return false;
  }

  private async attempt(
    request: ConversionRequest,
    selection: EncoderSelection,
    info: MediaInfo,
    options: ConvertOptions
  ): Promise<RunResult> {
    if (this.isCancelled(options)) {
      return cancelledBeforeStart();
    }

    // Hardware encoders need explicit color tags taken from the source
    const sourceColor = selection.hardware && carriesHdr(request, selection) ? info.color : null;
    if (sourceColor && selection.backend !== "software") {
      const resolution = resolveHdrColorParams(selection.backend, sourceColor);
      if (resolution.narrowed) {
        logger.warn(
          `HLG content detected. ${selection.parameters.encoder} has limited HLG support, using HDR10 parameters instead.`
        );
      }
      const { primaries, transfer, space, range } = resolution.params;
      logger.info(`Using HDR parameters for ${selection.backend}: ${primaries}/${transfer}/${space}/${range}`);
    }

    const args = buildConversionArgs(request, selection, sourceColor);
    logger.info(`Running: ${formatCommand(this.supervisor.engine, args)}`);

    return this.supervisor.run(args, {
      totalDuration: info.duration,
      onProgress: options.onProgress,
      signal: options.signal,
    });
  }

  private isCancelled(options: ConvertOptions): boolean {
    return this.cancelRequested || options.signal?.aborted === true;
  }

  private async logCompletion(request: ConversionRequest): Promise<void> {
    logger.info(`Conversion completed: ${path.basename(request.outputPath)}`);

    try {
      const inputMb = await fileSizeMb(request.inputPath);
      const outputMb = await fileSizeMb(request.outputPath);
      const change = inputMb > 0 ? ((outputMb - inputMb) / inputMb) * 100 : 0;
      const sign = change > 0 ? "+" : "";
      logger.info(`Size: ${inputMb.toFixed(1)} MB -> ${outputMb.toFixed(1)} MB (${sign}${change.toFixed(1)}%)`);
    } catch (e) {
      logger.warn(`Could not compare file sizes: ${errorMessage(e)}`);
    }
  }

  private async discardOutput(outputPath: string): Promise<void> {
    try {
      if (await removeIfExists(outputPath)) {
        logger.info(`Removed partial output: ${outputPath}`);
      }
    } catch (e) {
      logger.warn(`Could not remove partial output ${outputPath}: ${errorMessage(e)}`);
    }
  }
}

/**
 * Batch Converter
 *
 * Converts files one at a time. Files already in the target codec, or whose
 * destination exists, are skipped without starting the engine. A failure on
 * one file never stops the rest; cancellation is checked between files.
 */

import * as path from "node:path";
import type {
  BatchProgressListener,
  BatchResult,
  BatchTemplate,
  ConversionOutcome,
} from "@vidshift/shared";
import type { VideoConverter } from "./encoder.js";
import { errorMessage } from "./errors.js";
import { ensureDirectory, findVideoFiles, generateOutputPath, pathExists } from "./files.js";
import { createLogger } from "./logger.js";
import type { MediaProber } from "./probe.js";
import { getCodecDisplayName } from "./registry.js";

const logger = createLogger("Batch");

export interface BatchDependencies {
  converter: VideoConverter;
  prober: MediaProber;
}

export interface BatchOptions {
  onProgress?: BatchProgressListener;
  signal?: AbortSignal;
}

export interface DirectoryOptions extends BatchOptions {
  inputCodec?: string; // only convert files currently in this codec
}

/**
 * Video files under a directory, optionally only those currently encoded
 * with inputCodec. Files that cannot be probed are left out.
 */
export async function discoverVideoFiles(
  directory: string,
  prober: MediaProber,
  inputCodec?: string
): Promise<string[]> {
  const discovered = await findVideoFiles(directory);
  if (!inputCodec) {
    return discovered;
  }

  const matching: string[] = [];
  for (const file of discovered) {
    try {
      const info = await prober.probe(file);
      if (info.videoCodec === inputCodec) {
        matching.push(file);
      }
    } catch (e) {
      logger.warn(`Could not probe ${path.basename(file)}: ${errorMessage(e)}`);
    }
  }
  return matching;
}

export class BatchConverter {
  private readonly converter: VideoConverter;
  private readonly prober: MediaProber;
  private cancelRequested = false;

  constructor(deps: BatchDependencies) {
    this.converter = deps.converter;
    this.prober = deps.prober;
  }

  /**
   * Stop after the current file; the file in flight is cancelled through
   * the converter
   */
  cancel(): void {
    this.cancelRequested = true;
    this.converter.cancel();
  }

  async convertMany(
    files: readonly string[],
    template: BatchTemplate,
    options: BatchOptions = {}
  ): Promise<BatchResult> {
    this.cancelRequested = false;
    const result: BatchResult = {
      total: files.length,
      successful: 0,
      failed: 0,
      skipped: 0,
      cancelled: false,
      files: [],
    };

    for (const [index, inputPath] of files.entries()) {
      if (this.cancelRequested || options.signal?.aborted) {
        logger.warn(`Batch cancelled with ${files.length - index} file(s) remaining`);
        result.cancelled = true;
        break;
      }

      logger.info(`[${index + 1}/${files.length}] ${path.basename(inputPath)}`);
      const outcome = await this.convertFile(inputPath, index, files.length, template, options);
      if (!outcome) {
        logger.warn(`Batch cancelled with ${files.length - index} file(s) remaining`);
        result.cancelled = true;
        break;
      }
      result.files.push(outcome);

      switch (outcome.status) {
        case "success":
          result.successful++;
          break;
        case "skipped":
          result.skipped++;
          break;
        case "failed":
        case "error":
          result.failed++;
          break;
      }
    }

    logger.info(
      `Batch complete: ${result.successful} successful, ${result.failed} failed, ${result.skipped} skipped (of ${result.total})`
    );
    return result;
  }

  async convertDirectory(
    directory: string,
    template: BatchTemplate,
    options: DirectoryOptions = {}
  ): Promise<BatchResult> {
    const files = await discoverVideoFiles(directory, this.prober, options.inputCodec);
    logger.info(`Found ${files.length} video file(s) in ${directory}`);
    return this.convertMany(files, template, options);
  }

  private async convertFile(
    inputPath: string,
    index: number,
    total: number,
    template: BatchTemplate,
    options: BatchOptions
  ): Promise<ConversionOutcome | null> {
    let outputPath = "";
    try {
      const info = await this.prober.probe(inputPath);
      if (info.videoCodec === template.codec) {
        logger.info(`Skipping ${path.basename(inputPath)}: already ${getCodecDisplayName(template.codec)}`);
        return { status: "skipped", inputPath, outputPath, skipReason: "already-target-codec" };
      }

      outputPath = generateOutputPath(inputPath, template.outputDir, template.codec, template.suffix);
      if (await pathExists(outputPath)) {
        logger.info(`Skipping ${path.basename(inputPath)}: output already exists`);
        return { status: "skipped", inputPath, outputPath, skipReason: "output-exists" };
      }

      if (template.outputDir) {
        await ensureDirectory(template.outputDir);
      }

      // Cancelled before the engine started: the file is not counted
      if (this.cancelRequested || options.signal?.aborted) {
        return null;
      }

      const fileName = path.basename(inputPath);
      const success = await this.converter.convertOne(
        {
          inputPath,
          outputPath,
          codec: template.codec,
          quality: template.quality,
          preserveHdr: template.preserveHdr,
        },
        {
          onProgress: (progress) => options.onProgress?.({ fileName, current: index + 1, total, progress }),
          signal: options.signal,
        }
      );

      return { status: success ? "success" : "failed", inputPath, outputPath };
    } catch (e) {
      logger.error(`Error converting ${path.basename(inputPath)}: ${errorMessage(e)}`);
      return { status: "error", inputPath, outputPath, error: errorMessage(e) };
    }
  }
}

/**
 * Environment Validation
 *
 * Checks that the engine and the probing tool run, and that the software
 * encoder of every output codec was compiled in.
 */

import type { ConverterConfig } from "./config.js";
import { runTool, type SpawnFn, spawnProcess } from "./exec.js";
import { createLogger } from "./logger.js";
import { OUTPUT_CODECS, getCodecDisplayName, listOutputCodecs } from "./registry.js";

const logger = createLogger("Validation");

const VERSION_TIMEOUT = 10000;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  ffmpegVersion: string | null;
}

type ValidationConfig = Pick<ConverterConfig, "ffmpegPath" | "ffprobePath" | "detectTimeout">;

/**
 * Validate the converter environment
 */
export async function validateEnvironment(
  config: ValidationConfig,
  spawnFn: SpawnFn = spawnProcess
): Promise<ValidationResult> {
  const errors: string[] = [];
  const warnings: string[] = [];
  let ffmpegVersion: string | null = null;

  // 1. Engine
  const ffmpeg = await runTool(config.ffmpegPath, ["-version"], VERSION_TIMEOUT, spawnFn);
  if (ffmpeg.error) {
    errors.push(`FFmpeg not found or not executable (${config.ffmpegPath}): ${ffmpeg.error.message}`);
  } else if (ffmpeg.timedOut) {
    errors.push(`FFmpeg did not answer within ${VERSION_TIMEOUT}ms`);
  } else if (ffmpeg.exitCode !== 0) {
    errors.push(`FFmpeg check failed with exit code ${ffmpeg.exitCode}`);
  } else {
    ffmpegVersion = ffmpeg.stdout.split("\n")[0]?.trim() || null;
    logger.debug(`Found ${ffmpegVersion ?? config.ffmpegPath}`);
  }

  // 2. Probing tool
  const ffprobe = await runTool(config.ffprobePath, ["-version"], VERSION_TIMEOUT, spawnFn);
  if (ffprobe.error) {
    errors.push(`ffprobe not found or not executable (${config.ffprobePath}): ${ffprobe.error.message}`);
  } else if (ffprobe.timedOut || ffprobe.exitCode !== 0) {
    errors.push("ffprobe check failed");
  }

  // 3. Software encoders, the fallback for every codec
  if (ffmpegVersion !== null) {
    const listing = await runTool(
      config.ffmpegPath,
      ["-hide_banner", "-encoders"],
      config.detectTimeout,
      spawnFn
    );
    if (listing.exitCode === 0) {
      for (const codec of listOutputCodecs()) {
        const { encoder } = OUTPUT_CODECS[codec].backends.software;
        if (!listing.stdout.includes(encoder)) {
          warnings.push(`${getCodecDisplayName(codec)} software encoder ${encoder} is not available`);
        }
      }
    } else {
      warnings.push("Could not list FFmpeg encoders");
    }
  }

  for (const error of errors) {
    logger.error(error);
  }
  for (const warning of warnings) {
    logger.warn(warning);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    ffmpegVersion,
  };
}

/**
 * Filesystem helpers for locating inputs and naming outputs
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { OutputCodec } from "@vidshift/shared";
import { getCodecDescriptor } from "./registry.js";

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  ".mkv",
  ".mp4",
  ".m4v",
  ".mov",
  ".avi",
  ".webm",
]);

export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * All video files under a directory, recursively, in sorted order
 */
export async function findVideoFiles(directory: string): Promise<string[]> {
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  const found: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findVideoFiles(fullPath)));
    } else if (entry.isFile() && isVideoFile(entry.name)) {
      found.push(fullPath);
    }
  }

  return found.sort();
}

/**
 * <dir>/<stem><suffix><ext>, where dir defaults to the input's directory,
 * suffix to "_<codec>" and ext to the codec's container
 */
export function generateOutputPath(
  inputPath: string,
  outputDir: string | null,
  codec: OutputCodec,
  suffix?: string
): string {
  const { extension } = getCodecDescriptor(codec);
  const stem = path.basename(inputPath, path.extname(inputPath));
  const directory = outputDir ?? path.dirname(inputPath);
  return path.join(directory, `${stem}${suffix ?? `_${codec}`}${extension}`);
}

export async function ensureDirectory(directory: string): Promise<void> {
  await fs.promises.mkdir(directory, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function fileSizeMb(filePath: string): Promise<number> {
  const stats = await fs.promises.stat(filePath);
  return stats.size / (1024 * 1024);
}

/**
 * Delete a file if present. Returns whether something was removed.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return false;
    }
    throw e;
  }
}

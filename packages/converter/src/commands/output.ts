/**
 * Console rendering for conversion progress, plans and batch summaries
 */

import * as path from "node:path";
import type { BatchResult, ConversionPlan, ProgressSnapshot } from "@vidshift/shared";
import { formatCommand } from "../args.js";
import { getCodecDisplayName } from "../registry.js";

export function formatProgress(progress: ProgressSnapshot): string {
  const parts = [
    `${progress.percentage.toFixed(1)}%`,
    `frame ${progress.frame}`,
    `${progress.fps.toFixed(1)} fps`,
  ];
  if (progress.speed > 0) parts.push(`${progress.speed.toFixed(2)}x`);
  if (progress.time) parts.push(progress.time);
  if (progress.size) parts.push(progress.size);
  return parts.join(" | ");
}

const SKIP_LABELS = {
  "already-target-codec": "already in target codec",
  "output-exists": "output exists",
} as const;

export function formatPlan(plan: ConversionPlan, engine: string): string[] {
  const lines = [
    `Input:   ${plan.inputPath} (${plan.inputCodec ? getCodecDisplayName(plan.inputCodec) : "unknown codec"})`,
    `Output:  ${plan.outputPath} (${getCodecDisplayName(plan.codec)})`,
    `Encoder: ${plan.encoder} (${plan.backend})`,
    `HDR:     ${plan.hdr}`,
  ];
  if (plan.skipReason) {
    lines.push(`Note:    ${SKIP_LABELS[plan.skipReason]}`);
  }
  lines.push(`Command: ${formatCommand(engine, plan.args)}`);
  return lines;
}

export function formatPlanSummary(plan: ConversionPlan): string {
  const skip = plan.skipReason ? ` [skip: ${SKIP_LABELS[plan.skipReason]}]` : "";
  const hdr = plan.hdr === "none" ? "" : ` HDR ${plan.hdr}`;
  return `${path.basename(plan.inputPath)} -> ${path.basename(plan.outputPath)} (${plan.encoder}${hdr})${skip}`;
}

export function formatBatchSummary(result: BatchResult): string[] {
  const lines = [
    "Batch conversion summary:",
    `  Total:      ${result.total}`,
    `  Successful: ${result.successful}`,
    `  Failed:     ${result.failed}`,
    `  Skipped:    ${result.skipped}`,
  ];
  if (result.cancelled) {
    lines.push(`  Cancelled after ${result.files.length} file(s)`);
  }

  const problems = result.files.filter((file) => file.status === "failed" || file.status === "error");
  if (problems.length > 0) {
    lines.push("", "Failed files:");
    for (const file of problems) {
      lines.push(`  ${path.basename(file.inputPath)}${file.error ? `: ${file.error}` : ""}`);
    }
  }
  return lines;
}

/**
 * Progress printer that rewrites one terminal line, throttled to at most
 * one update per interval
 */
export function createProgressPrinter(
  write: (text: string) => void,
  intervalMs = 500
): { update(line: string): void; done(): void } {
  let lastWrite = 0;
  let written = false;

  return {
    update(line: string) {
      const now = Date.now();
      if (now - lastWrite < intervalMs) return;
      lastWrite = now;
      written = true;
      write(`\r\x1b[K${line}`);
    },
    done() {
      if (written) {
        write("\n");
        written = false;
      }
    },
  };
}

/**
 * Batch Command
 *
 * Converts every video file under a directory, one at a time.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { BatchTemplate } from "@vidshift/shared";
import { discoverVideoFiles } from "../batch.js";
import type { CliArgs } from "../cli.js";
import { getConfig } from "../config.js";
import { UsageError } from "../errors.js";
import { planConversion } from "../plan.js";
import { type RuntimeOptions, createRuntime } from "../runtime.js";
import { createProgressPrinter, formatBatchSummary, formatPlanSummary, formatProgress } from "./output.js";
import { requireTarget, resolveCodec, resolveQuality } from "./options.js";

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export async function batch(args: CliArgs, runtimeOptions: RuntimeOptions = {}): Promise<number> {
  const config = getConfig();
  const directory = path.resolve(requireTarget(args, "input directory"));
  const codec = resolveCodec(args);

  if (!(await isDirectory(directory))) {
    throw new UsageError(`Not a directory: ${directory}`);
  }

  const template: BatchTemplate = {
    codec,
    quality: resolveQuality(args, codec),
    preserveHdr: !args.flags.noHdr,
    outputDir: args.flags.output ? path.resolve(args.flags.output) : null,
    suffix: config.outputSuffix,
  };
  const inputCodec = args.flags.inputCodec;

  const runtime = await createRuntime(config, { ...runtimeOptions, cpuOnly: args.flags.cpu });

  if (args.flags.dryRun) {
    const files = await discoverVideoFiles(directory, runtime.prober, inputCodec);
    console.log(`Dry run, ${files.length} file(s) found, nothing will be converted:\n`);
    for (const file of files) {
      const plan = await planConversion(file, template, {
        selector: runtime.selector,
        prober: runtime.prober,
        preferGpu: runtime.preferGpu,
      });
      console.log(`  ${formatPlanSummary(plan)}`);
    }
    return 0;
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.log("\n[Batch] Cancelling...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const printer = createProgressPrinter((text) => process.stdout.write(text));
  let currentFile = "";
  try {
    const result = await runtime.batch.convertDirectory(directory, template, {
      inputCodec,
      signal: controller.signal,
      onProgress: ({ fileName, current, total, progress }) => {
        if (fileName !== currentFile) {
          printer.done();
          currentFile = fileName;
        }
        printer.update(`[${current}/${total}] ${fileName}: ${formatProgress(progress)}`);
      },
    });
    printer.done();

    console.log("");
    for (const line of formatBatchSummary(result)) {
      console.log(line);
    }

    if (result.cancelled) return 130;
    return result.failed > 0 ? 1 : 0;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

/**
 * Convert Command
 *
 * Converts a single file, or with --dry-run shows what would run.
 */

import * as path from "node:path";
import type { CliArgs } from "../cli.js";
import { getConfig } from "../config.js";
import { ensureDirectory, generateOutputPath, pathExists } from "../files.js";
import { planConversion } from "../plan.js";
import { type RuntimeOptions, createRuntime } from "../runtime.js";
import { UsageError } from "../errors.js";
import { createProgressPrinter, formatPlan, formatProgress } from "./output.js";
import { requireTarget, resolveCodec, resolveQuality } from "./options.js";

export async function convert(args: CliArgs, runtimeOptions: RuntimeOptions = {}): Promise<number> {
  const config = getConfig();
  const inputPath = path.resolve(requireTarget(args, "input file"));
  const codec = resolveCodec(args);
  const quality = resolveQuality(args, codec);

  if (!(await pathExists(inputPath))) {
    throw new UsageError(`Input file not found: ${inputPath}`);
  }

  const outputPath = args.flags.output
    ? path.resolve(args.flags.output)
    : generateOutputPath(inputPath, null, codec, config.outputSuffix);
  const template = {
    codec,
    quality,
    preserveHdr: !args.flags.noHdr,
    outputDir: null,
    suffix: config.outputSuffix,
  };

  const runtime = await createRuntime(config, { ...runtimeOptions, cpuOnly: args.flags.cpu });

  if (args.flags.dryRun) {
    const plan = await planConversion(inputPath, template, {
      selector: runtime.selector,
      prober: runtime.prober,
      preferGpu: runtime.preferGpu,
      outputPath,
    });
    console.log("Dry run, nothing will be converted:\n");
    for (const line of formatPlan(plan, runtime.supervisor.engine)) {
      console.log(`  ${line}`);
    }
    return 0;
  }

  if ((await pathExists(outputPath)) && !args.flags.overwrite) {
    throw new UsageError(`Output file ${outputPath} already exists. Pass --overwrite to replace it`);
  }
  await ensureDirectory(path.dirname(outputPath));

  const controller = new AbortController();
  const onSigint = () => {
    console.log("\n[Convert] Cancelling...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const printer = createProgressPrinter((text) => process.stdout.write(text));
  try {
    const success = await runtime.converter.convertOne(
      { inputPath, outputPath, codec, quality, preserveHdr: template.preserveHdr },
      {
        onProgress: (progress) => printer.update(formatProgress(progress)),
        signal: controller.signal,
      }
    );
    printer.done();

    if (controller.signal.aborted) {
      console.log("Conversion cancelled");
      return 130;
    }
    if (success) {
      console.log(`Output: ${outputPath}`);
      return 0;
    }
    console.error("Conversion failed");
    return 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

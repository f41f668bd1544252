#!/usr/bin/env node
/**
 * vidshift
 *
 * Entry point for the CLI.
 * Dispatches to appropriate command based on CLI arguments.
 */

import { parseArgs } from "./cli.js";
import { batch } from "./commands/batch.js";
import { convert } from "./commands/convert.js";
import { help } from "./commands/help.js";
import { info } from "./commands/info.js";
import { version } from "./commands/version.js";
import { initConfig } from "./config.js";
import { UsageError } from "./errors.js";
import { setLogLevel } from "./logger.js";

async function main(): Promise<number> {
  // Parse command-line arguments (skip first two: node and script path)
  const args = parseArgs(process.argv.slice(2));

  // Check for unknown arguments
  if (args.unknown.length > 0 || args.missingValues.length > 0) {
    if (args.unknown.length > 0) {
      console.error(`Unknown arguments: ${args.unknown.join(", ")}`);
    }
    if (args.missingValues.length > 0) {
      console.error(`Missing value for: ${args.missingValues.join(", ")}`);
    }
    console.error("Run 'vidshift --help' for usage information");
    return 1;
  }

  const prepare = () => {
    const config = initConfig();
    setLogLevel(args.flags.verbose ? "debug" : config.logLevel);
  };

  // Dispatch to appropriate command
  switch (args.command) {
    case "help":
      help();
      return 0;

    case "version":
      version();
      return 0;

    case "convert":
      prepare();
      return convert(args);

    case "batch":
      prepare();
      return batch(args);

    case "info":
      prepare();
      return info();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(error.message);
    } else {
      console.error("[Fatal]", error);
    }
    process.exit(1);
  });

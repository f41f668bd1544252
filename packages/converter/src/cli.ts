/**
 * CLI Argument Parser
 *
 * Parses command-line arguments without external dependencies.
 */

export type CliCommand = "convert" | "batch" | "info" | "help" | "version";

export interface CliArgs {
  command: CliCommand;
  target?: string; // file for convert, directory for batch
  flags: {
    help?: boolean;
    version?: boolean;
    output?: string;
    quality?: string;
    codec?: string;
    inputCodec?: string;
    noHdr?: boolean;
    cpu?: boolean;
    dryRun?: boolean;
    overwrite?: boolean;
    verbose?: boolean;
  };
  unknown: string[];
  missingValues: string[]; // options given without their value
}

const COMMANDS: readonly CliCommand[] = ["convert", "batch", "info", "help", "version"];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse command-line arguments
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: "help",
    flags: {},
    unknown: [],
    missingValues: [],
  };
  let commandSeen = false;

  const takeValue = (index: number, name: string): string | undefined => {
    const value = args[index];
    if (value === undefined || value.startsWith("-")) {
      result.missingValues.push(name);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    // Help flags
    if (arg === "--help" || arg === "-h") {
      result.command = "help";
      result.flags.help = true;
      continue;
    }

    // Version flag
    if (arg === "--version") {
      result.command = "version";
      result.flags.version = true;
      continue;
    }

    if (arg === "--verbose" || arg === "-v") {
      result.flags.verbose = true;
      continue;
    }

    // Options with values
    if (arg === "--output" || arg === "-o") {
      const value = takeValue(i + 1, arg);
      if (value !== undefined) {
        result.flags.output = value;
        i++;
      }
      continue;
    }

    if (arg === "--quality" || arg === "-q") {
      const value = takeValue(i + 1, arg);
      if (value !== undefined) {
        result.flags.quality = value;
        i++;
      }
      continue;
    }

    if (arg === "--codec" || arg === "-c") {
      const value = takeValue(i + 1, arg);
      if (value !== undefined) {
        result.flags.codec = value.toLowerCase();
        i++;
      }
      continue;
    }

    if (arg === "--input-codec") {
      const value = takeValue(i + 1, arg);
      if (value !== undefined) {
        result.flags.inputCodec = value.toLowerCase();
        i++;
      }
      continue;
    }

    // Switches
    if (arg === "--no-hdr") {
      result.flags.noHdr = true;
      continue;
    }

    if (arg === "--cpu") {
      result.flags.cpu = true;
      continue;
    }

    if (arg === "--dry-run") {
      result.flags.dryRun = true;
      continue;
    }

    if (arg === "--overwrite" || arg === "-y") {
      result.flags.overwrite = true;
      continue;
    }

    // First bare word is the command, the second its target
    if (!arg.startsWith("-")) {
      if (!commandSeen && isCommand(arg)) {
        commandSeen = true;
        if (!result.flags.help && !result.flags.version) {
          result.command = arg;
        }
        continue;
      }
      if (commandSeen && result.target === undefined) {
        result.target = arg;
        continue;
      }
    }

    // Unknown argument
    result.unknown.push(arg);
  }

  return result;
}

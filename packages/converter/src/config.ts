/**
 * Converter Configuration
 *
 * Loads configuration from environment variables.
 */

import { z } from "zod";

const booleanFlag = z
  .string()
  .transform((value) => !["0", "false", "no", "off"].includes(value.trim().toLowerCase()));

export const configSchema = z.object({
  // External tools
  ffmpegPath: z.string().min(1).default("ffmpeg"),
  ffprobePath: z.string().min(1).default("ffprobe"),

  // Encoder selection
  preferGpu: booleanFlag.default("true"),

  // Timeouts (ms)
  detectTimeout: z.number().int().min(1000).default(10000),
  probeTimeout: z.number().int().min(1000).default(30000),
  hangTimeout: z.number().int().min(1000).default(30000),

  // Output naming (default: "_<codec>")
  outputSuffix: z.string().optional(),

  // Logging
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ConverterConfig = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export function readEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const rawConfig = {
    ffmpegPath: env.VIDSHIFT_FFMPEG_PATH,
    ffprobePath: env.VIDSHIFT_FFPROBE_PATH,
    preferGpu: env.VIDSHIFT_PREFER_GPU,
    detectTimeout: parseInteger(env.VIDSHIFT_DETECT_TIMEOUT),
    probeTimeout: parseInteger(env.VIDSHIFT_PROBE_TIMEOUT),
    hangTimeout: parseInteger(env.VIDSHIFT_HANG_TIMEOUT),
    outputSuffix: env.VIDSHIFT_OUTPUT_SUFFIX,
    logLevel: env.VIDSHIFT_LOG_LEVEL,
  };

  // Remove undefined values to let defaults apply
  return Object.fromEntries(Object.entries(rawConfig).filter(([, v]) => v !== undefined));
}

function loadConfig(): ConverterConfig {
  const result = configSchema.safeParse(readEnvironment(process.env));
  if (!result.success) {
    console.error("Invalid configuration:");
    for (const error of result.error.errors) {
      console.error(`  ${error.path.join(".")}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

let config: ConverterConfig | null = null;

export function getConfig(): ConverterConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

export function initConfig(): ConverterConfig {
  config = loadConfig();
  return config;
}

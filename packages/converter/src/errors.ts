/**
 * Error types raised by the conversion engine
 *
 * Failures the engine expects (non-zero exit, hang, degraded detection) are
 * reported as results. These are for the cases that cannot be.
 */

export class UnsupportedCodecError extends Error {
  constructor(public readonly codec: string) {
    super(`Codec "${codec}" is not registered as an output codec`);
    this.name = "UnsupportedCodecError";
  }
}

export class ProbeError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly cause?: unknown
  ) {
    super(`Failed to probe "${filePath}": ${message}`);
    this.name = "ProbeError";
  }
}

export class ProcessSupervisionError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ProcessSupervisionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Engine Process Supervisor
 *
 * Runs one engine invocation: streams its diagnostic output line by line,
 * turns status lines into progress snapshots, kills it when it goes quiet
 * for too long or the caller cancels, and always reaps it before returning.
 *
 * Starting -> Running -> Completed | Hung | Cancelled -> Reaped
 */

import type { ProgressListener, ProgressSnapshot } from "@vidshift/shared";
import { ProcessSupervisionError, errorMessage } from "./errors.js";
import { type ChildHandle, type SpawnFn, spawnProcess } from "./exec.js";
import { LineReader } from "./lines.js";
import { createLogger } from "./logger.js";
import { createProgressSnapshot, isProgressLine, parseProgressLine } from "./progress.js";

const logger = createLogger("Engine");

export interface SupervisorTimings {
  readTimeout: number; // longest single wait for a diagnostic line
  hangTimeout: number; // silence before the engine is presumed stuck
  exitTimeout: number; // grace period for exit after output ends
  terminateTimeout: number; // wait after SIGTERM before SIGKILL
  tailLines: number; // diagnostic lines kept for failure analysis
}

export const DEFAULT_TIMINGS: Readonly<SupervisorTimings> = Object.freeze({
  readTimeout: 1000,
  hangTimeout: 30000,
  exitTimeout: 10000,
  terminateTimeout: 5000,
  tailLines: 10,
});

export interface SupervisorOptions extends Partial<SupervisorTimings> {
  ffmpegPath?: string;
  spawn?: SpawnFn;
}

export type RunReason = "completed" | "hung" | "cancelled" | "spawn-error";

export interface RunResult {
  success: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  reason: RunReason;
  invalidArgument: boolean; // engine rejected an argument, typically HDR tags on a GPU encoder
  stderrTail: string[];
}

export interface RunOptions {
  totalDuration?: number | null;
  onProgress?: ProgressListener;
  onLine?: (line: string) => void;
  signal?: AbortSignal;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  error: Error | null;
}

const INVALID_ARGUMENT_PATTERNS = ["Invalid argument", "error code: -22"];

export function hasInvalidArgumentSignature(lines: readonly string[]): boolean {
  return lines.some((line) => INVALID_ARGUMENT_PATTERNS.some((pattern) => line.includes(pattern)));
}

export class EngineSupervisor {
  private readonly ffmpegPath: string;
  private readonly spawnFn: SpawnFn;
  private readonly timings: SupervisorTimings;
  private cancelRequested = false;
  private active = false;

  constructor(options: SupervisorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.spawnFn = options.spawn ?? spawnProcess;
    this.timings = {
      readTimeout: options.readTimeout ?? DEFAULT_TIMINGS.readTimeout,
      hangTimeout: options.hangTimeout ?? DEFAULT_TIMINGS.hangTimeout,
      exitTimeout: options.exitTimeout ?? DEFAULT_TIMINGS.exitTimeout,
      terminateTimeout: options.terminateTimeout ?? DEFAULT_TIMINGS.terminateTimeout,
      tailLines: options.tailLines ?? DEFAULT_TIMINGS.tailLines,
    };
  }

  get engine(): string {
    return this.ffmpegPath;
  }

  get running(): boolean {
    return this.active;
  }

  /**
   * Request termination of the in-flight run. Observed within one read
   * interval; a no-op when nothing is running.
   */
  cancel(): void {
    if (this.active) {
      this.cancelRequested = true;
    }
  }

  async run(args: string[], options: RunOptions = {}): Promise<RunResult> {
    if (this.active) {
      throw new ProcessSupervisionError("A run is already in progress on this supervisor");
    }
    if (options.signal?.aborted) {
      return this.result("cancelled", null, null, []);
    }

    let child: ChildHandle;
    try {
      child = this.spawnFn(this.ffmpegPath, args);
    } catch (e) {
      logger.error(`Failed to start ${this.ffmpegPath}: ${errorMessage(e)}`);
      return this.result("spawn-error", null, null, []);
    }

    this.active = true;
    this.cancelRequested = false;
    const onAbort = () => this.cancel();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const exited = new Promise<ExitStatus>((resolve) => {
      child.once("exit", (code, signal) => resolve({ code, signal, error: null }));
      child.once("error", (error) => resolve({ code: null, signal: null, error }));
    });

    const startTime = Date.now();
    const tail: string[] = [];

    try {
      let reason: Exclude<RunReason, "spawn-error">;
      let status: ExitStatus;
      try {
        reason = await this.monitor(child, tail, options);
        status = await this.reap(child, exited, reason);
      } catch (e) {
        await this.forceStop(child, exited);
        throw new ProcessSupervisionError(`Error while supervising ${this.ffmpegPath}: ${errorMessage(e)}`, e);
      }

      if (status.error) {
        logger.error(`Failed to start ${this.ffmpegPath}: ${status.error.message}`);
        return this.result("spawn-error", null, null, tail);
      }

      const result = this.result(reason, status.code, status.signal, tail);
      if (result.success) {
        logger.info(`Conversion took ${((Date.now() - startTime) / 1000).toFixed(1)} seconds`);
      } else if (reason === "completed") {
        logger.error(`${this.ffmpegPath} failed with exit code ${status.code ?? status.signal}`);
        for (const line of tail) {
          logger.error(`ffmpeg: ${line}`);
        }
        if (result.invalidArgument) {
          logger.error("Engine reported an invalid argument, likely HDR parameters the GPU encoder rejects");
        }
      }
      return result;
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      this.active = false;
      this.cancelRequested = false;
    }
  }

  /**
   * Read diagnostics until the stream ends, the engine goes quiet or the
   * caller cancels
   */
  private async monitor(
    child: ChildHandle,
    tail: string[],
    options: RunOptions
  ): Promise<Exclude<RunReason, "spawn-error">> {
    // Encoded media goes to the output file; drain stdout so it never blocks
    child.stdout?.resume();
    if (!child.stderr) {
      return "completed";
    }

    const reader = new LineReader(child.stderr);
    const totalDuration = options.totalDuration ?? null;
    let snapshot: ProgressSnapshot = createProgressSnapshot();
    let lastOutput = Date.now();

    while (true) {
      if (this.cancelRequested) {
        logger.info("Cancelling conversion...");
        return "cancelled";
      }

      const read = await reader.next(this.timings.readTimeout);

      if (read.kind === "end") {
        return "completed";
      }

      if (read.kind === "timeout") {
        const silentFor = Date.now() - lastOutput;
        if (silentFor >= this.timings.hangTimeout) {
          logger.warn(
            `${this.ffmpegPath} seems to be hanging (no output for ${Math.round(silentFor / 1000)}s), terminating`
          );
          return "hung";
        }
        continue;
      }

      lastOutput = Date.now();
      const line = read.line.trim();
      if (!line) continue;

      tail.push(line);
      if (tail.length > this.timings.tailLines) {
        tail.shift();
      }

      logger.debug(`ffmpeg: ${line}`);
      options.onLine?.(line);

      if (isProgressLine(line)) {
        snapshot = parseProgressLine(line, snapshot, totalDuration);
        options.onProgress?.(snapshot);
      }
    }
  }

  /**
   * Wait for exit after normal completion; go straight to termination for
   * hung or cancelled runs
   */
  private async reap(
    child: ChildHandle,
    exited: Promise<ExitStatus>,
    reason: Exclude<RunReason, "spawn-error">
  ): Promise<ExitStatus> {
    if (reason === "completed") {
      const status = await this.waitFor(exited, this.timings.exitTimeout);
      if (status) return status;
      logger.error(`${this.ffmpegPath} did not exit gracefully, terminating`);
    }
    return this.forceStop(child, exited);
  }

  private async forceStop(child: ChildHandle, exited: Promise<ExitStatus>): Promise<ExitStatus> {
    if (!this.isAlive(child)) {
      return exited;
    }

    child.kill("SIGTERM");
    const status = await this.waitFor(exited, this.timings.terminateTimeout);
    if (status) return status;

    logger.warn(`${this.ffmpegPath} did not terminate gracefully, killing`);
    child.kill("SIGKILL");
    return exited;
  }

  private isAlive(child: ChildHandle): boolean {
    return child.exitCode === null && child.signalCode === null;
  }

  private waitFor(exited: Promise<ExitStatus>, ms: number): Promise<ExitStatus | null> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(null), ms);
      void exited.then((status) => {
        clearTimeout(timer);
        resolve(status);
      });
    });
  }

  private result(
    reason: RunReason,
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    tail: string[]
  ): RunResult {
    const success = reason === "completed" && exitCode === 0;
    return {
      success,
      exitCode,
      signal,
      reason,
      invalidArgument: !success && reason === "completed" && hasInvalidArgumentSignature(tail),
      stderrTail: [...tail],
    };
  }
}

/**
 * Child process plumbing shared by the detector, the prober and the supervisor
 */

import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

/**
 * The parts of a ChildProcess the converter relies on. Kept narrow so tests
 * can hand in an in-process fake.
 */
export interface ChildHandle {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: "error", listener: (error: Error) => void): this;
}

export type SpawnFn = (command: string, args: string[]) => ChildHandle;

/**
 * Spawn with stdin closed and both output streams piped
 */
export const spawnProcess: SpawnFn = (command, args) =>
  spawn(command, args, {
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

export interface ToolResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error: Error | null; // set when the tool could not be started
}

/**
 * Run a short-lived tool to completion, killing it after timeoutMs.
 * Never rejects: failures are reported through the result.
 */
export function runTool(
  command: string,
  args: string[],
  timeoutMs: number,
  spawnFn: SpawnFn = spawnProcess
): Promise<ToolResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const finish = (exitCode: number | null, error: Error | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode, stdout, stderr, timedOut, error });
    };

    let child: ChildHandle;
    try {
      child = spawnFn(command, args);
    } catch (e) {
      resolve({
        exitCode: null,
        stdout,
        stderr,
        timedOut,
        error: e instanceof Error ? e : new Error(String(e)),
      });
      return;
    }

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
      finish(null, null);
    }, timeoutMs);

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (data: string) => {
      stdout += data;
    });
    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (data: string) => {
      stderr += data;
    });

    child.once("error", (error) => finish(null, error));
    // "close" fires once both output streams have drained
    child.once("close", (code) => finish(code, null));
  });
}

/**
 * Tests for the engine process supervisor
 */

import { beforeAll, describe, test, expect } from "vitest";
import type { ProgressSnapshot } from "@vidshift/shared";
import { ProcessSupervisionError } from "../errors.js";
import { setConsoleOutput } from "../logger.js";
import { EngineSupervisor, hasInvalidArgumentSignature } from "../process.js";
import { type EngineScript, PROGRESS_LINE, fakeSpawn } from "./helpers/fakes.js";

const TIMINGS = {
  readTimeout: 20,
  hangTimeout: 100,
  exitTimeout: 100,
  terminateTimeout: 50,
};

function supervisorFor(script: EngineScript) {
  const { spawn, children } = fakeSpawn(script);
  const supervisor = new EngineSupervisor({ ...TIMINGS, ffmpegPath: "/opt/ffmpeg", spawn });
  return { supervisor, children };
}

beforeAll(() => {
  setConsoleOutput(false);
});

describe("EngineSupervisor", () => {
  describe("happy path", () => {
    test("reports success and progress for a clean run", async () => {
      const { supervisor, children } = supervisorFor((child) => {
        child.writeStderr(`${PROGRESS_LINE}\r`);
        child.exit(0);
      });
      const snapshots: ProgressSnapshot[] = [];

      const result = await supervisor.run(["-i", "in.mkv", "out.mkv"], {
        totalDuration: 20,
        onProgress: (snapshot) => snapshots.push(snapshot),
      });

      expect(result).toEqual({
        success: true,
        exitCode: 0,
        signal: null,
        reason: "completed",
        invalidArgument: false,
        stderrTail: [PROGRESS_LINE],
      });
      expect(snapshots).toHaveLength(1);
      expect(snapshots[0]?.percentage).toBe(50);
      expect(children[0]?.command).toBe("/opt/ffmpeg");
      expect(children[0]?.args).toEqual(["-i", "in.mkv", "out.mkv"]);
      expect(supervisor.running).toBe(false);
    });

    test("passes trimmed non-blank lines to onLine", async () => {
      const { supervisor } = supervisorFor((child) => {
        child.writeStderr("  Input #0, matroska  \n\n   \nOutput #0\n");
        child.exit(0);
      });
      const lines: string[] = [];

      await supervisor.run([], { onLine: (line) => lines.push(line) });

      expect(lines).toEqual(["Input #0, matroska", "Output #0"]);
    });

    test("can run again after a run finishes", async () => {
      const { supervisor, children } = supervisorFor((child) => child.exit(0));

      expect((await supervisor.run([])).success).toBe(true);
      expect((await supervisor.run([])).success).toBe(true);
      expect(children).toHaveLength(2);
    });
  });

  describe("non-happy path", () => {
    test("flags an invalid argument failure", async () => {
      const { supervisor } = supervisorFor((child) => {
        child.writeStderr("[hevc_nvenc @ 0x1] InitializeEncoder failed\n");
        child.writeStderr("Error initializing output stream 0:0 -- Invalid argument\n");
        child.exit(1);
      });

      const result = await supervisor.run([]);

      expect(result.success).toBe(false);
      expect(result.reason).toBe("completed");
      expect(result.exitCode).toBe(1);
      expect(result.invalidArgument).toBe(true);
    });

    test("keeps only the last ten lines of diagnostics", async () => {
      const { supervisor } = supervisorFor((child) => {
        for (let i = 1; i <= 15; i++) {
          child.writeStderr(`line ${i}\n`);
        }
        child.exit(1);
      });

      const result = await supervisor.run([]);

      expect(result.stderrTail).toEqual([
        "line 6", "line 7", "line 8", "line 9", "line 10",
        "line 11", "line 12", "line 13", "line 14", "line 15",
      ]);
      expect(result.invalidArgument).toBe(false);
    });

    test("terminates an engine that goes silent", async () => {
      const { supervisor, children } = supervisorFor(() => {
        // silent and never exits
      });

      const result = await supervisor.run([]);

      expect(result.reason).toBe("hung");
      expect(result.success).toBe(false);
      expect(result.signal).toBe("SIGTERM");
      expect(children[0]?.kills).toEqual(["SIGTERM"]);
    });

    test("kills an engine that ignores SIGTERM", async () => {
      const { supervisor, children } = supervisorFor((child) => {
        child.ignoreSigterm = true;
      });

      const result = await supervisor.run([]);

      expect(result.reason).toBe("hung");
      expect(result.signal).toBe("SIGKILL");
      expect(children[0]?.kills).toEqual(["SIGTERM", "SIGKILL"]);
    });

    test("stops an engine that closes its output but never exits", async () => {
      const { supervisor, children } = supervisorFor((child) => {
        child.stderr.end();
      });

      const result = await supervisor.run([]);

      expect(result.reason).toBe("completed");
      expect(result.success).toBe(false);
      expect(result.exitCode).toBeNull();
      expect(children[0]?.kills).toEqual(["SIGTERM"]);
    });

    test("cancels on request", async () => {
      const { supervisor, children } = supervisorFor((child) => {
        child.writeStderr(`${PROGRESS_LINE}\n`);
      });

      const result = await supervisor.run([], { onProgress: () => supervisor.cancel() });

      expect(result.reason).toBe("cancelled");
      expect(result.success).toBe(false);
      expect(children[0]?.kills).toEqual(["SIGTERM"]);
    });

    test("cancels when the signal aborts", async () => {
      const controller = new AbortController();
      const { supervisor } = supervisorFor((child) => {
        child.writeStderr("Press [q] to stop\n");
      });

      const result = await supervisor.run([], {
        signal: controller.signal,
        onLine: () => controller.abort(),
      });

      expect(result.reason).toBe("cancelled");
    });

    test("does not start when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const { supervisor, children } = supervisorFor((child) => child.exit(0));

      const result = await supervisor.run([], { signal: controller.signal });

      expect(result.reason).toBe("cancelled");
      expect(children).toHaveLength(0);
    });

    test("ignores cancel when idle", async () => {
      const { supervisor } = supervisorFor((child) => child.exit(0));

      supervisor.cancel();

      expect((await supervisor.run([])).success).toBe(true);
    });

    test("reports a missing executable as a spawn error", async () => {
      const { supervisor } = supervisorFor((child) => child.fail(new Error("spawn ffmpeg ENOENT")));

      const result = await supervisor.run([]);

      expect(result.reason).toBe("spawn-error");
      expect(result.success).toBe(false);
      expect(result.exitCode).toBeNull();
    });

    test("reports a throwing spawn as a spawn error", async () => {
      const supervisor = new EngineSupervisor({
        ...TIMINGS,
        spawn: () => {
          throw new Error("EACCES");
        },
      });

      const result = await supervisor.run([]);

      expect(result.reason).toBe("spawn-error");
      expect(supervisor.running).toBe(false);
    });

    test("stops the engine and rethrows when a listener throws", async () => {
      const { supervisor, children } = supervisorFor((child) => {
        child.writeStderr(`${PROGRESS_LINE}\n`);
      });

      await expect(
        supervisor.run([], {
          onProgress: () => {
            throw new Error("listener failed");
          },
        })
      ).rejects.toThrow(ProcessSupervisionError);

      expect(children[0]?.kills).toEqual(["SIGTERM"]);
      expect(supervisor.running).toBe(false);
    });

    test("refuses a second concurrent run", async () => {
      const { supervisor } = supervisorFor((child) => child.exit(0));

      const first = supervisor.run([]);
      await expect(supervisor.run([])).rejects.toThrow("already in progress");
      expect((await first).success).toBe(true);
    });
  });

  describe("hasInvalidArgumentSignature", () => {
    test("matches either engine wording", () => {
      expect(hasInvalidArgumentSignature(["Conversion failed: error code: -22"])).toBe(true);
      expect(hasInvalidArgumentSignature(["Invalid argument"])).toBe(true);
      expect(hasInvalidArgumentSignature(["No such file or directory"])).toBe(false);
    });
  });
});

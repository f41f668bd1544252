/**
 * Tests for tagged console logging
 */

import { afterEach, describe, test, expect, vi } from "vitest";
import {
  type LogEntry,
  addLogListener,
  createLogger,
  setConsoleOutput,
  setLogLevel,
} from "../logger.js";

afterEach(() => {
  setLogLevel("info");
  setConsoleOutput(false);
  vi.restoreAllMocks();
});

describe("logger", () => {
  test("delivers entries to listeners until they unsubscribe", () => {
    setConsoleOutput(false);
    const entries: LogEntry[] = [];
    const unsubscribe = addLogListener((entry) => entries.push(entry));
    const logger = createLogger("Test");

    logger.info("first");
    unsubscribe();
    logger.info("second");

    expect(entries).toHaveLength(1);
    expect(entries[0]?.tag).toBe("Test");
    expect(entries[0]?.level).toBe("info");
    expect(entries[0]?.message).toBe("first");
  });

  test("filters entries below the current level", () => {
    setConsoleOutput(false);
    setLogLevel("warn");
    const levels: string[] = [];
    const unsubscribe = addLogListener((entry) => levels.push(entry.level));
    const logger = createLogger("Test");

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    unsubscribe();

    expect(levels).toEqual(["warn", "error"]);
  });

  test("prefixes console lines with the tag", () => {
    setConsoleOutput(true);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("Encoder").warn("careful");
    createLogger("Batch").info("done");

    expect(warn).toHaveBeenCalledWith("[Encoder] careful");
    expect(log).toHaveBeenCalledWith("[Batch] done");
  });

  test("stays off the console when output is disabled", () => {
    setConsoleOutput(false);
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("Test").error("hidden");

    expect(error).not.toHaveBeenCalled();
  });
});

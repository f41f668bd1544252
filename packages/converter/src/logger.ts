/**
 * Console logging with component tags
 *
 * Lines look like "[Encoder] Starting: ffmpeg ...". Presentation layers that
 * render their own output (progress bars, a GUI log pane) subscribe with
 * addLogListener and receive every line that passes the level filter, in order.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  tag: string;
  message: string;
  timestamp: number;
}

export type LogListener = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = "info";
let consoleEnabled = true;
const listeners = new Set<LogListener>();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Turn console output off when a listener takes over rendering
 */
export function setConsoleOutput(enabled: boolean): void {
  consoleEnabled = enabled;
}

export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export class Logger {
  constructor(private readonly tag: string) {}

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

    const entry: LogEntry = { level, tag: this.tag, message, timestamp: Date.now() };
    for (const listener of listeners) {
      listener(entry);
    }

    if (!consoleEnabled) return;

    const line = `[${this.tag}] ${message}`;
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }
}

export function createLogger(tag: string): Logger {
  return new Logger(tag);
}

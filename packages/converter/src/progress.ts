/**
 * Progress parsing for the engine's status lines
 *
 * Format: frame= 1234 fps= 25 q=28.0 size=    1024kB time=00:00:49.36 bitrate= 170.1kbits/s speed=1.0x
 */

import type { ProgressSnapshot } from "@vidshift/shared";

export function createProgressSnapshot(): ProgressSnapshot {
  return {
    frame: 0,
    fps: 0,
    bitrate: "",
    size: "",
    time: "",
    elapsedSeconds: 0,
    speed: 0,
    percentage: 0,
  };
}

export function isProgressLine(line: string): boolean {
  return line.includes("frame=") && line.includes("time=");
}

/**
 * Format seconds as HH:MM:SS
 */
export function formatClock(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return [hours, minutes, secs].map((n) => String(n).padStart(2, "0")).join(":");
}

const FIELD_PATTERNS = {
  frame: /frame=\s*(\d+)/,
  fps: /fps=\s*(\d+(?:\.\d+)?)/,
  bitrate: /bitrate=\s*(\d+(?:\.\d+)?\w*bits\/s)/,
  size: /size=\s*(\d+(?:\.\d+)?\w*B)/,
  time: /time=(\d{2}):(\d{2}):(\d{2})\.(\d{2})/,
  speed: /speed=\s*(\d+(?:\.\d+)?)x/,
};

/**
 * Fold one status line into the previous snapshot.
 *
 * Each field is extracted independently; a missing or malformed field keeps
 * its previous value. Lines without both a frame and a time marker are noise
 * and return the previous values unchanged.
 */
export function parseProgressLine(
  line: string,
  previous: ProgressSnapshot,
  totalDuration: number | null
): ProgressSnapshot {
  const next = { ...previous };
  if (!isProgressLine(line)) {
    return next;
  }

  const frame = FIELD_PATTERNS.frame.exec(line);
  if (frame?.[1]) {
    next.frame = Math.max(previous.frame, parseInt(frame[1], 10));
  }

  const fps = FIELD_PATTERNS.fps.exec(line);
  if (fps?.[1]) {
    next.fps = parseFloat(fps[1]);
  }

  const bitrate = FIELD_PATTERNS.bitrate.exec(line);
  if (bitrate?.[1]) {
    next.bitrate = bitrate[1];
  }

  const size = FIELD_PATTERNS.size.exec(line);
  if (size?.[1]) {
    next.size = size[1];
  }

  const time = FIELD_PATTERNS.time.exec(line);
  if (time) {
    const [, hours, minutes, seconds, centiseconds] = time.map(Number);
    const elapsed =
      (hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (seconds ?? 0) + (centiseconds ?? 0) / 100;

    if (elapsed >= previous.elapsedSeconds) {
      next.elapsedSeconds = elapsed;
      next.time = formatClock(elapsed);
      if (totalDuration !== null && totalDuration > 0) {
        next.percentage = Math.min(100, (elapsed / totalDuration) * 100);
      }
    }
  }

  const speed = FIELD_PATTERNS.speed.exec(line);
  if (speed?.[1]) {
    next.speed = parseFloat(speed[1]);
  }

  return next;
}

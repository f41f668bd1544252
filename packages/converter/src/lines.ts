/**
 * Line reader with a per-read deadline
 *
 * The engine rewrites its status line in place with a bare carriage return,
 * so "\r", "\n" and "\r\n" all end a line here.
 */

import type { Readable } from "node:stream";

export type ReadResult =
  | { kind: "line"; line: string }
  | { kind: "timeout" }
  | { kind: "end" };

type Waiter = (result: ReadResult) => void;

export class LineReader {
  private readonly lines: string[] = [];
  private buffer = "";
  private pendingCr = false;
  private ended = false;
  private waiter: Waiter | null = null;

  constructor(stream: Readable) {
    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => this.push(chunk));
    stream.on("end", () => this.finish());
    stream.on("close", () => this.finish());
    // A broken pipe ends the stream as far as readers are concerned
    stream.on("error", () => this.finish());
  }

  get done(): boolean {
    return this.ended && this.lines.length === 0;
  }

  /**
   * Next complete line, or a timeout once timeoutMs passes without one
   */
  next(timeoutMs: number): Promise<ReadResult> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve({ kind: "line", line });
    }
    if (this.ended) {
      return Promise.resolve({ kind: "end" });
    }
    if (this.waiter) {
      return Promise.reject(new Error("LineReader.next() called while a read is pending"));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);

      this.waiter = (result) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(result);
      };
    });
  }

  private push(chunk: string): void {
    for (const char of chunk) {
      if (char === "\n") {
        if (this.pendingCr) {
          // second half of \r\n, the line was already emitted
          this.pendingCr = false;
          continue;
        }
        this.emitLine();
      } else if (char === "\r") {
        this.emitLine();
        this.pendingCr = true;
      } else {
        this.pendingCr = false;
        this.buffer += char;
      }
    }
  }

  private emitLine(): void {
    const line = this.buffer;
    this.buffer = "";
    this.deliver(line);
  }

  private deliver(line: string): void {
    if (this.waiter) {
      this.waiter({ kind: "line", line });
    } else {
      this.lines.push(line);
    }
  }

  private finish(): void {
    if (this.ended) return;
    if (this.buffer !== "") {
      this.emitLine();
    }
    this.ended = true;
    if (this.waiter && this.lines.length === 0) {
      this.waiter({ kind: "end" });
    }
  }
}

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

export type ReadResult =
  | { kind: "line"; line: string }
  | { kind: "eof" }
  | { kind: "timeout" };

/**
 * Buffers lines from a stream and hands them out one at a time, each read
 * bounded by a timeout. One reader serves one consumer; reads are not
 * meant to overlap.
 */
export class LineReader {
  private lines: string[] = [];
  private ended = false;
  private wake: (() => void) | null = null;

  constructor(input: Readable) {
    const rl = createInterface({ input, crlfDelay: Infinity });
    rl.on("line", (line) => {
      this.lines.push(line);
      this.notify();
    });
    rl.on("close", () => this.end());
  }

  /** Mark the stream finished; buffered lines stay readable. */
  end(): void {
    this.ended = true;
    this.notify();
  }

  async next(timeoutMs: number): Promise<ReadResult> {
    const buffered = this.take();
    if (buffered) return buffered;
    if (timeoutMs <= 0) return { kind: "timeout" };

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await new Promise<boolean>((resolve) => {
      this.wake = () => resolve(false);
      timer = setTimeout(() => resolve(true), timeoutMs);
    });
    clearTimeout(timer);
    this.wake = null;

    return (timedOut ? null : this.take()) ?? { kind: "timeout" };
  }

  private take(): ReadResult | null {
    const line = this.lines.shift();
    if (line !== undefined) return { kind: "line", line };
    if (this.ended) return { kind: "eof" };
    return null;
  }

  private notify(): void {
    this.wake?.();
  }
}

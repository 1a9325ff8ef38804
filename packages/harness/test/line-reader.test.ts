import { PassThrough } from "node:stream";

import { describe, expect, it } from "vitest";

import { LineReader } from "../src/line-reader";

describe("LineReader", () => {
  it("hands out lines in order, then end of stream", async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);

    input.end("uciok\nreadyok\n");

    expect(await reader.next(1000)).toEqual({ kind: "line", line: "uciok" });
    expect(await reader.next(1000)).toEqual({ kind: "line", line: "readyok" });
    expect(await reader.next(1000)).toEqual({ kind: "eof" });
  });

  it("waits for a line that arrives later", async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);

    const pending = reader.next(1000);
    setTimeout(() => input.write("bestmove e2e4\n"), 10);

    expect(await pending).toEqual({ kind: "line", line: "bestmove e2e4" });
  });

  it("times out when nothing arrives", async () => {
    const reader = new LineReader(new PassThrough());

    expect(await reader.next(20)).toEqual({ kind: "timeout" });
    expect(await reader.next(0)).toEqual({ kind: "timeout" });
  });

  it("keeps buffered lines readable after end()", async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);

    input.write("info depth 1\n");
    await new Promise((resolve) => setTimeout(resolve, 10));
    reader.end();

    expect(await reader.next(100)).toEqual({ kind: "line", line: "info depth 1" });
    expect(await reader.next(100)).toEqual({ kind: "eof" });
  });
});

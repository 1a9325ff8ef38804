import { describe, expect, it } from "vitest";

import { STARTPOS } from "../src/config";
import { ProcessError, ProcessTimeoutError } from "../src/errors";
import { EngineSession, withEngineSession } from "../src/process-session";
import { fakeLauncher, uciEngine } from "./helpers/fake-engine";

describe("EngineSession", () => {
  it("performs the handshake and sends engine options before readiness", async () => {
    const { launcher, launches } = fakeLauncher(uciEngine());
    const session = new EngineSession("engine", { readTimeoutMs: 1000, launcher, engineOptions: { Threads: 2 } });

    await session.initialise();

    expect(session.state).toBe("ready");
    expect(launches[0].process.received).toEqual(["uci", "setoption name Threads value 2", "isready"]);
    await session.terminate();
  });

  it("searches a position and returns the best move", async () => {
    const { launcher, launches } = fakeLauncher(uciEngine({ bestMoves: { [STARTPOS]: "e2e4" } }));
    const session = new EngineSession("engine", { readTimeoutMs: 1000, launcher });
    await session.initialise();

    expect(await session.query(STARTPOS, 3)).toBe("e2e4");
    expect(launches[0].process.received.slice(2)).toEqual([
      "ucinewgame",
      `position fen ${STARTPOS}`,
      "go depth 3",
    ]);
    await session.terminate();
  });

  it("returns an empty move when output ends before bestmove", async () => {
    const { launcher } = fakeLauncher(uciEngine({ dieOnGo: true }));
    const session = new EngineSession("engine", { readTimeoutMs: 1000, launcher });
    await session.initialise();

    expect(await session.query(STARTPOS, 3)).toBe("");
    await session.terminate();
  });

  it("does not treat diagnostic output as protocol", async () => {
    const { launcher } = fakeLauncher((proc) => {
      proc.onLine((line) => {
        if (line === "uci") proc.complain("uciok");
        if (line === "quit") proc.exit(0);
      });
    });
    const session = new EngineSession("engine", { readTimeoutMs: 50, launcher });

    const init = session.initialise();

    await expect(init).rejects.toBeInstanceOf(ProcessTimeoutError);
    await expect(init).rejects.toMatchObject({
      message: 'Waiting for "uciok" from engine timed out after 50ms',
      stderr: "uciok",
    });
    await session.terminate();
  });

  it("bounds the wait for a search", async () => {
    const { launcher } = fakeLauncher(uciEngine({ hangOnGo: true }));
    const session = new EngineSession("engine", { readTimeoutMs: 50, launcher });
    await session.initialise();

    await expect(session.query(STARTPOS, 6)).rejects.toThrow('Waiting for "bestmove" from engine timed out after 50ms');
    await session.terminate();
  });

  it("fails the handshake when the engine closes its output", async () => {
    const { launcher } = fakeLauncher((proc) => {
      proc.onLine((line) => {
        if (line === "uci") {
          proc.complain("cannot open book");
          proc.exit(1);
        }
      });
    });
    const session = new EngineSession("engine", { readTimeoutMs: 1000, launcher });

    const init = session.initialise();

    await expect(init).rejects.toBeInstanceOf(ProcessError);
    await expect(init).rejects.toThrow('engine closed its output before "uciok"');
    await session.terminate();
  });

  it("refuses queries outside the ready state", async () => {
    const { launcher } = fakeLauncher(uciEngine());
    const session = new EngineSession("engine", { readTimeoutMs: 1000, launcher });

    await expect(session.query(STARTPOS, 1)).rejects.toThrow("Cannot query a session that is idle");
    await session.terminate();
    await expect(session.initialise()).rejects.toThrow("Cannot initialise a session that is closed");
  });

  it("sends quit once and waits for the exit", async () => {
    const { launcher, launches } = fakeLauncher(uciEngine());
    const session = new EngineSession("engine", { readTimeoutMs: 1000, launcher });
    await session.initialise();

    await session.terminate();
    await session.terminate();

    expect(session.state).toBe("closed");
    expect(launches[0].process.received.filter((l) => l === "quit")).toHaveLength(1);
    expect(launches[0].process.killed).toBe(false);
  });

  it("kills an engine that ignores quit", async () => {
    const { launcher, launches } = fakeLauncher(uciEngine({ ignoreQuit: true }));
    const session = new EngineSession("engine", { readTimeoutMs: 1000, quitGraceMs: 20, launcher });
    await session.initialise();

    await session.terminate();

    expect(launches[0].process.killed).toBe(true);
  });

  it("shuts down an engine whose input is already closed", async () => {
    const { launcher, launches } = fakeLauncher(uciEngine());
    const session = new EngineSession("engine", { readTimeoutMs: 1000, quitGraceMs: 20, launcher });
    await session.initialise();
    launches[0].process.stdin.destroy();

    await session.terminate();

    expect(session.state).toBe("closed");
    expect(launches[0].process.received).not.toContain("quit");
    expect(launches[0].process.killed).toBe(true);
  });
});

describe("withEngineSession", () => {
  it("returns the body's result and terminates", async () => {
    const { launcher, launches } = fakeLauncher(uciEngine({ bestMoves: { [STARTPOS]: "d2d4" } }));

    const move = await withEngineSession("engine", { readTimeoutMs: 1000, launcher }, (s) => s.query(STARTPOS, 2));

    expect(move).toBe("d2d4");
    expect(launches[0].process.received.at(-1)).toBe("quit");
  });

  it("terminates when the body throws", async () => {
    const { launcher, launches } = fakeLauncher(uciEngine());

    await expect(
      withEngineSession("engine", { readTimeoutMs: 1000, launcher }, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(launches[0].process.received).toContain("quit");
  });
});

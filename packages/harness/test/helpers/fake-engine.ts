/**
 * In-process stand-ins for external processes, driven through the
 * `EngineLauncher` seam. Nothing here spawns a real process.
 */

import { once } from "node:events";
import { createInterface } from "node:readline";
import { PassThrough } from "node:stream";
import type { EngineLauncher, EngineProcess, ProcessExit } from "../../src/process-launcher";

export class FakeProcess implements EngineProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly exited: Promise<ProcessExit>;
  /** Every line the harness wrote to stdin */
  readonly received: string[] = [];
  killed = false;
  private settle: (exit: ProcessExit) => void = () => {};
  private done = false;

  constructor(
    readonly command: string,
    readonly args: readonly string[]
  ) {
    this.exited = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  say(...lines: string[]): void {
    if (this.done) return;
    for (const line of lines) this.stdout.write(`${line}\n`);
  }

  complain(...lines: string[]): void {
    if (this.done) return;
    for (const line of lines) this.stderr.write(`${line}\n`);
  }

  /** Close the output streams, then report the exit once they have drained. */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.done) return;
    this.done = true;
    const drained = Promise.all([once(this.stdout, "end"), once(this.stderr, "end")]);
    this.stdout.end();
    this.stderr.end();
    void drained.then(() => this.settle({ code, signal }));
  }

  failToStart(error: Error): void {
    if (this.done) return;
    this.done = true;
    this.stdout.end();
    this.stderr.end();
    this.settle({ code: null, signal: null, error });
  }

  kill(): void {
    this.killed = true;
    this.exit(null, "SIGKILL");
  }

  /** Call `handler` for each stdin line as it arrives. */
  onLine(handler: (line: string) => void): void {
    createInterface({ input: this.stdin }).on("line", (line) => {
      this.received.push(line);
      handler(line);
    });
  }

  /** Call `handler` once with all of stdin after the harness closes it. */
  onInput(handler: (input: string) => void): void {
    let input = "";
    this.stdin.setEncoding("utf8");
    this.stdin.on("data", (chunk: string) => {
      input += chunk;
    });
    this.stdin.on("end", () => {
      this.received.push(...input.split("\n").filter((l) => l.length > 0));
      handler(input);
    });
  }
}

export interface LaunchRecord {
  command: string;
  args: readonly string[];
  process: FakeProcess;
}

/** A launcher whose processes are configured by `setup`, with every launch recorded. */
export function fakeLauncher(setup: (proc: FakeProcess) => void): {
  launcher: EngineLauncher;
  launches: LaunchRecord[];
} {
  const launches: LaunchRecord[] = [];
  const launcher: EngineLauncher = (command, args) => {
    const proc = new FakeProcess(command, args);
    launches.push({ command, args, process: proc });
    setup(proc);
    return proc;
  };
  return { launcher, launches };
}

// ── Ready-made behaviours ───────────────────────────────────────────

export interface UciEngineBehaviour {
  /** Best move per position; positions not listed get `bestmove (none)` */
  bestMoves?: Record<string, string>;
  /** Lines written to stderr right after `uci` */
  stderrOnUci?: string[];
  /** Never answer `go` */
  hangOnGo?: boolean;
  /** Close output instead of answering `go` */
  dieOnGo?: boolean;
  /** Ignore `quit` */
  ignoreQuit?: boolean;
}

export function uciEngine(behaviour: UciEngineBehaviour = {}): (proc: FakeProcess) => void {
  return (proc) => {
    let position = "";
    proc.onLine((line) => {
      if (line === "uci") {
        proc.complain(...(behaviour.stderrOnUci ?? []));
        proc.say("id name FakeEngine", "uciok");
      } else if (line === "isready") {
        proc.say("readyok");
      } else if (line.startsWith("position fen ")) {
        position = line.slice("position fen ".length);
      } else if (line.startsWith("go depth ")) {
        if (behaviour.hangOnGo) return;
        if (behaviour.dieOnGo) {
          proc.exit(0);
          return;
        }
        const move = behaviour.bestMoves?.[position];
        proc.say(`info depth ${line.slice("go depth ".length)} score cp 0`);
        proc.say(move ? `bestmove ${move}` : "bestmove (none)");
      } else if (line === "quit" && !behaviour.ignoreQuit) {
        proc.exit(0);
      }
    });
  };
}

export interface OneShotReply {
  stdout?: string;
  stderr?: string;
  code?: number;
  /** Never exit */
  hang?: boolean;
}

/** A process that answers once, after stdin closes. */
export function oneShot(reply: (args: readonly string[], input: string) => OneShotReply): (proc: FakeProcess) => void {
  return (proc) => {
    proc.onInput((input) => {
      const r = reply(proc.args, input);
      if (r.hang) return;
      if (r.stdout) proc.stdout.write(r.stdout);
      if (r.stderr) proc.stderr.write(r.stderr);
      proc.exit(r.code ?? 0);
    });
  };
}

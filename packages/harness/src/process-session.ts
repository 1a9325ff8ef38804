/**
 * Interactive UCI session over one long-lived engine process.
 *
 * Protocol tokens are matched on stdout only; stderr is logged and kept
 * for error messages, never parsed. Every wait is bounded.
 *
 *   idle ──initialise()──▶ ready ──terminate()──▶ closed
 *     └──────────────terminate()───────────────────┘
 */

import { createInterface } from "node:readline";
import { errorMessage, ProcessError, ProcessTimeoutError } from "./errors";
import { LineReader } from "./line-reader";
import { logger } from "./logger";
import { QUIT_GRACE_MS } from "./config";
import { describeExit, spawnProcess, type EngineLauncher, type EngineProcess } from "./process-launcher";
import { extractBestMove } from "./metric-extractor";

export type SessionState = "idle" | "ready" | "closed";

export interface EngineSessionOptions {
  /** Bound on each protocol wait (handshake, readiness, one search) */
  readTimeoutMs: number;
  /** How long `terminate()` waits after `quit` before killing */
  quitGraceMs?: number;
  /** Sent as `setoption name <key> value <value>` during the handshake */
  engineOptions?: Record<string, string | number>;
  launcher?: EngineLauncher;
}

const STDERR_TAIL_LINES = 20;

export class EngineSession {
  readonly enginePath: string;
  private readonly proc: EngineProcess;
  private readonly stdout: LineReader;
  private readonly stderrTail: string[] = [];
  private readonly readTimeoutMs: number;
  private readonly quitGraceMs: number;
  private readonly engineOptions: Record<string, string | number>;
  private sessionState: SessionState = "idle";

  constructor(enginePath: string, options: EngineSessionOptions) {
    const launcher = options.launcher ?? spawnProcess;
    this.enginePath = enginePath;
    this.readTimeoutMs = options.readTimeoutMs;
    this.quitGraceMs = options.quitGraceMs ?? QUIT_GRACE_MS;
    this.engineOptions = options.engineOptions ?? {};

    this.proc = launcher(enginePath, []);
    this.stdout = new LineReader(this.proc.stdout);
    void this.proc.exited.then((exit) => {
      logger.debug(`${enginePath} ${describeExit(exit)}`);
      this.stdout.end();
    });

    createInterface({ input: this.proc.stderr, crlfDelay: Infinity }).on("line", (line) => {
      logger.debug(`[${enginePath} stderr] ${line}`);
      this.stderrTail.push(line);
      if (this.stderrTail.length > STDERR_TAIL_LINES) this.stderrTail.shift();
    });

    this.proc.stdin.on("error", (err) => {
      logger.debug(`${enginePath}: stdin error (${err.message})`);
    });
  }

  get state(): SessionState {
    return this.sessionState;
  }

  /** `uci` → `uciok`, engine options, then `isready` → `readyok`. */
  async initialise(): Promise<void> {
    if (this.sessionState !== "idle") {
      throw new ProcessError(`Cannot initialise a session that is ${this.sessionState}`, {
        command: this.enginePath,
      });
    }

    this.send("uci");
    await this.expectLine((line) => line.includes("uciok"), "uciok");

    for (const [name, value] of Object.entries(this.engineOptions)) {
      this.send(`setoption name ${name} value ${value}`);
    }

    this.send("isready");
    await this.expectLine((line) => line.includes("readyok"), "readyok");
    this.sessionState = "ready";
  }

  /**
   * Search `position` to `depth` and return the engine's best move, or ""
   * when the engine's output ends without one.
   */
  async query(position: string, depth: number): Promise<string> {
    if (this.sessionState !== "ready") {
      throw new ProcessError(`Cannot query a session that is ${this.sessionState}`, {
        command: this.enginePath,
      });
    }

    this.send("ucinewgame");
    this.send(`position fen ${position}`);
    this.send(`go depth ${depth}`);

    const line = await this.readUntil((l) => l.startsWith("bestmove"), "bestmove");
    return line === null ? "" : extractBestMove(line);
  }

  /** Best-effort `quit`, then wait for exit; kills after the grace period. Idempotent. */
  async terminate(): Promise<void> {
    if (this.sessionState === "closed") return;
    this.sessionState = "closed";

    try {
      this.send("quit");
    } catch (err) {
      logger.debug(`${this.enginePath}: quit not delivered (${errorMessage(err)})`);
    }
    this.proc.stdin.end();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const graceExpired = new Promise<"expired">((resolve) => {
      timer = setTimeout(() => resolve("expired"), this.quitGraceMs);
    });
    const outcome = await Promise.race([this.proc.exited, graceExpired]);
    clearTimeout(timer);

    if (outcome === "expired") {
      logger.warn(`${this.enginePath} did not exit within ${this.quitGraceMs}ms of quit; killing`);
      this.proc.kill();
      await this.proc.exited;
    }
  }

  private send(command: string): void {
    const { stdin } = this.proc;
    if (stdin.destroyed || stdin.writableEnded) {
      throw new ProcessError(`${this.enginePath} is no longer accepting input (while sending "${command}")`, {
        command: this.enginePath,
        stderr: this.stderrText(),
      });
    }
    logger.debug(`> ${command}`);
    stdin.write(`${command}\n`);
  }

  /** Read stdout until a matching line (returned) or end of stream (null). */
  private async readUntil(match: (line: string) => boolean, what: string): Promise<string | null> {
    const deadline = performance.now() + this.readTimeoutMs;

    for (;;) {
      const result = await this.stdout.next(deadline - performance.now());
      if (result.kind === "eof") return null;
      if (result.kind === "timeout") {
        throw new ProcessTimeoutError(`Waiting for "${what}" from ${this.enginePath}`, this.readTimeoutMs, {
          command: this.enginePath,
          stderr: this.stderrText(),
        });
      }
      logger.debug(`< ${result.line}`);
      if (match(result.line)) return result.line;
    }
  }

  private async expectLine(match: (line: string) => boolean, what: string): Promise<string> {
    const line = await this.readUntil(match, what);
    if (line === null) {
      throw new ProcessError(`${this.enginePath} closed its output before "${what}"`, {
        command: this.enginePath,
        stderr: this.stderrText(),
      });
    }
    return line;
  }

  private stderrText(): string {
    return this.stderrTail.join("\n");
  }
}

/**
 * Scoped acquisition: the session is initialised, handed to `fn`, and
 * terminated on every exit path.
 */
export async function withEngineSession<T>(
  enginePath: string,
  options: EngineSessionOptions,
  fn: (session: EngineSession) => Promise<T>
): Promise<T> {
  const session = new EngineSession(enginePath, options);
  try {
    await session.initialise();
    return await fn(session);
  } finally {
    await session.terminate();
  }
}

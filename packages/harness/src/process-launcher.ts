/**
 * The one place that spawns OS processes.
 *
 * Everything else talks to an `EngineProcess`, so sessions, one-shot runs
 * and the move resolver can all be driven by an in-process stand-in.
 */

import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all */
  error?: Error;
}

export interface EngineProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Settles once the process is gone and its output streams are closed; never rejects */
  readonly exited: Promise<ProcessExit>;
  kill(): void;
}

export type EngineLauncher = (command: string, args: readonly string[]) => EngineProcess;

export const spawnProcess: EngineLauncher = (command, args) => {
  const child = spawn(command, [...args], { stdio: ["pipe", "pipe", "pipe"] });

  const exited = new Promise<ProcessExit>((resolve) => {
    child.once("error", (error) => resolve({ code: null, signal: null, error }));
    child.once("close", (code, signal) => resolve({ code, signal }));
  });

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    exited,
    kill: () => {
      child.kill("SIGKILL");
    },
  };
};

export function describeExit(exit: ProcessExit): string {
  if (exit.error) return `failed to start (${exit.error.message})`;
  if (exit.signal) return `killed by ${exit.signal}`;
  return `exited with code ${exit.code}`;
}

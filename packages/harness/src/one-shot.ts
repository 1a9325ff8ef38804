/**
 * One-shot process invocation: start, optionally feed stdin, collect all
 * output, enforce a wall-clock bound.
 */

import { ProcessError, ProcessTimeoutError } from "./errors";
import { logger } from "./logger";
import { describeExit, spawnProcess, type EngineLauncher, type ProcessExit } from "./process-launcher";

export interface OneShotOptions {
  args?: readonly string[];
  /** Written to stdin, which is then closed */
  input?: string;
  timeoutMs: number;
  launcher?: EngineLauncher;
}

export interface OneShotResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  elapsedMs: number;
}

const PREVIEW_CHARS = 4_000;

function preview(s: string): string {
  const trimmed = s.trim();
  if (trimmed.length <= PREVIEW_CHARS) return trimmed;
  return `${trimmed.slice(0, PREVIEW_CHARS)}… (+${trimmed.length - PREVIEW_CHARS} chars)`;
}

/**
 * Run `command` to completion. Rejects with ProcessTimeoutError when the
 * bound is hit (the process is killed first) and with ProcessError on a
 * non-zero exit or a failed start.
 */
export async function runOneShot(command: string, options: OneShotOptions): Promise<OneShotResult> {
  const { args = [], input, timeoutMs, launcher = spawnProcess } = options;

  const start = performance.now();
  const proc = launcher(command, args);

  let stdout = "";
  let stderr = "";
  proc.stdout.setEncoding("utf8");
  proc.stderr.setEncoding("utf8");
  proc.stdout.on("data", (chunk: string) => {
    stdout += chunk;
  });
  proc.stderr.on("data", (chunk: string) => {
    stderr += chunk;
  });

  proc.stdin.on("error", (err) => {
    logger.debug(`${command}: stdin closed early (${err.message})`);
  });
  proc.stdin.end(input ?? "");

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), timeoutMs);
  });

  let outcome: ProcessExit | "timeout";
  try {
    outcome = await Promise.race([proc.exited, timeout]);
  } finally {
    clearTimeout(timer);
  }
  const elapsedMs = Math.round(performance.now() - start);

  if (outcome === "timeout") {
    proc.kill();
    throw new ProcessTimeoutError(command, timeoutMs, { command, stderr: preview(stderr) });
  }

  if (outcome.error || outcome.code !== 0) {
    throw new ProcessError(`${command} ${describeExit(outcome)}: ${preview(stderr) || preview(stdout)}`, {
      command,
      exitCode: outcome.code,
      stderr: preview(stderr),
      cause: outcome.error,
    });
  }

  logger.debug(`${command} ${args.join(" ")} finished in ${elapsedMs}ms`);
  return { stdout, stderr, exitCode: 0, elapsedMs };
}

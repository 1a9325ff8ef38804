/**
 * Helpers shared by the CLI commands: option parsing, setup checks and
 * the top-level error boundary.
 */

import { existsSync } from "node:fs";
import { errorMessage, SetupError } from "../errors";
import { setLogLevel } from "../logger";

export interface CommonOptions {
  timeout: string;
  json?: string;
  debug?: boolean;
}

export function requireFile(path: string, what: string): void {
  if (!existsSync(path)) {
    throw new SetupError(`${what} not found: ${path}`);
  }
}

export function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new SetupError(`${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function parseOptionalPositiveInt(value: string | undefined, flag: string): number | undefined {
  return value === undefined ? undefined : parsePositiveInt(value, flag);
}

/** `--timeout` is given in seconds (fractions allowed). */
export function parseTimeoutMs(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new SetupError(`--timeout must be a positive number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}

export function applyLogLevel(options: { debug?: boolean }): void {
  setLogLevel(options.debug ? "debug" : "info");
}

/**
 * Run a command body and turn its outcome into the process exit status.
 * Any error (setup, suite format, process) is fatal: message on stderr,
 * exit status 1.
 */
export async function runCommand(body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (err) {
    console.error(`error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

/**
 * Error taxonomy for the harness.
 *
 * Setup and suite-format errors stop a run before any case executes.
 * Process and extraction errors abort the remaining suite. Resolver
 * failures never surface as errors (see move-resolver.ts).
 */

/** Missing binary, missing suite file, or a suite with nothing to run. */
export class SetupError extends Error {
  override name = "SetupError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A suite record that violates the required field shape. */
export class SuiteFormatError extends Error {
  override name = "SuiteFormatError";
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.source = source;
  }
}

export interface ProcessErrorDetails {
  command: string;
  exitCode?: number | null;
  stderr?: string;
  cause?: unknown;
}

/** An external process exited badly, failed to start, or broke protocol. */
export class ProcessError extends Error {
  override name = "ProcessError";
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, details: ProcessErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.command = details.command;
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? "";
  }
}

/** A wait on an external process exceeded its configured bound. */
export class ProcessTimeoutError extends ProcessError {
  override name = "ProcessTimeoutError";
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number, details: ProcessErrorDetails) {
    super(`${what} timed out after ${timeoutMs}ms`, details);
    this.timeoutMs = timeoutMs;
  }
}

/** A required field was not present in captured process output. */
export class ExtractionError extends Error {
  override name = "ExtractionError";
  readonly output: string;

  constructor(what: string, output: string) {
    super(`Unable to parse ${what} from output:\n${output}`);
    this.output = output;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

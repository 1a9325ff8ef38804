/**
 * Suite drivers: run cases strictly in file order, one engine invocation
 * at a time, and score them.
 *
 * Process and extraction errors propagate and abort the remaining suite.
 */

import { DEFAULT_REFERENCE_THREADS } from "./config";
import { logger } from "./logger";
import { deriveNps, extractPerftNodes, extractReferenceNodes, extractTelemetry } from "./metric-extractor";
import { MoveResolver } from "./move-resolver";
import { runOneShot } from "./one-shot";
import type { EngineLauncher } from "./process-launcher";
import { withEngineSession } from "./process-session";
import {
  classifyPerft,
  countSolved,
  effectiveDepth,
  gateStatuses,
  gateStatusesPass,
  isSolved,
  perftStatusesPass,
  verdict,
} from "./scoring";
import type {
  BenchmarkCase,
  PerftComparisonReport,
  PerftComparisonRow,
  PerftSample,
  TacticalCase,
  TacticalRow,
  TacticsReport,
  TelemetryReport,
  TelemetryRow,
} from "./types";

export interface RunCallbacks<Row> {
  onProgress?: (completed: number, total: number) => void;
  /** Called as soon as each case is scored, before the next one starts */
  onResult?: (row: Row) => void;
}

// ── Single invocations ──────────────────────────────────────────────

/** `<perft> --fen <position> --depth <depth>` */
export function perftArgs(position: string, depth: number): string[] {
  return ["--fen", position, "--depth", String(depth)];
}

export function referencePerftScript(position: string, depth: number, threads: number): string {
  return [
    "uci",
    `setoption name Threads value ${threads}`,
    `position fen ${position}`,
    `go perft ${depth}`,
    "quit",
    "",
  ].join("\n");
}

export async function runSubjectPerft(
  binary: string,
  position: string,
  depth: number,
  timeoutMs: number,
  launcher?: EngineLauncher
): Promise<PerftSample> {
  const { stdout, elapsedMs } = await runOneShot(binary, {
    args: perftArgs(position, depth),
    timeoutMs,
    launcher,
  });
  const nodes = extractPerftNodes(stdout);
  return { nodes, timeMs: elapsedMs, nps: deriveNps(nodes, elapsedMs) };
}

export async function runReferencePerft(
  engine: string,
  position: string,
  depth: number,
  timeoutMs: number,
  threads: number,
  launcher?: EngineLauncher
): Promise<PerftSample> {
  const { stdout, elapsedMs } = await runOneShot(engine, {
    input: referencePerftScript(position, depth, threads),
    timeoutMs,
    launcher,
  });
  const nodes = extractReferenceNodes(stdout);
  return { nodes, timeMs: elapsedMs, nps: deriveNps(nodes, elapsedMs) };
}

export async function runTelemetryCase(
  binary: string,
  suiteCase: BenchmarkCase,
  timeoutMs: number,
  launcher?: EngineLauncher
): Promise<PerftSample> {
  const { stdout, elapsedMs } = await runOneShot(binary, {
    args: perftArgs(suiteCase.position, suiteCase.depth),
    timeoutMs,
    launcher,
  });
  return extractTelemetry(stdout, elapsedMs);
}

// ── Perft comparison ────────────────────────────────────────────────

export interface PerftCompareOptions {
  subjectPath: string;
  referencePath: string;
  timeoutMs: number;
  /** Search min(declared depth, depthCap) */
  depthCap?: number;
  referenceThreads?: number;
  launcher?: EngineLauncher;
}

export async function runPerftComparison(
  suite: readonly BenchmarkCase[],
  options: PerftCompareOptions,
  callbacks: RunCallbacks<PerftComparisonRow> = {}
): Promise<PerftComparisonReport> {
  const threads = options.referenceThreads ?? DEFAULT_REFERENCE_THREADS;
  const rows: PerftComparisonRow[] = [];

  for (const [i, suiteCase] of suite.entries()) {
    const depth = effectiveDepth(suiteCase.depth, options.depthCap);
    const subject = await runSubjectPerft(
      options.subjectPath,
      suiteCase.position,
      depth,
      options.timeoutMs,
      options.launcher
    );
    const reference = await runReferencePerft(
      options.referencePath,
      suiteCase.position,
      depth,
      options.timeoutMs,
      threads,
      options.launcher
    );

    const statuses = classifyPerft(subject, reference, depth, suiteCase);
    const row: PerftComparisonRow = {
      index: i + 1,
      case: suiteCase,
      depth,
      subject,
      reference,
      statuses,
      passed: perftStatusesPass(statuses),
    };
    rows.push(row);
    callbacks.onResult?.(row);
    callbacks.onProgress?.(i + 1, suite.length);
  }

  return {
    kind: "perft-compare",
    rows,
    verdict: verdict(rows.every((r) => r.passed)),
  };
}

// ── Telemetry gates ─────────────────────────────────────────────────

export interface TelemetryOptions {
  binaryPath: string;
  timeoutMs: number;
  /** Map a failed gate to a failing exit status (off: reporting only) */
  failOnGate?: boolean;
  launcher?: EngineLauncher;
}

export async function runTelemetry(
  cases: readonly BenchmarkCase[],
  options: TelemetryOptions,
  callbacks: RunCallbacks<TelemetryRow> = {}
): Promise<TelemetryReport> {
  const rows: TelemetryRow[] = [];

  for (const [i, suiteCase] of cases.entries()) {
    const sample = await runTelemetryCase(options.binaryPath, suiteCase, options.timeoutMs, options.launcher);
    const statuses = gateStatuses(suiteCase, sample);
    const row: TelemetryRow = {
      index: i + 1,
      case: suiteCase,
      sample,
      statuses,
      passed: gateStatusesPass(statuses),
    };
    rows.push(row);
    callbacks.onResult?.(row);
    callbacks.onProgress?.(i + 1, cases.length);
  }

  return {
    kind: "telemetry",
    rows,
    verdict: verdict(rows.every((r) => r.passed), options.failOnGate ?? false),
  };
}

// ── Tactical suite ──────────────────────────────────────────────────

export interface TacticsOptions {
  enginePath: string;
  depth: number;
  /** Bound on each engine protocol wait */
  timeoutMs: number;
  resolver: MoveResolver;
  failOnMiss?: boolean;
  quitGraceMs?: number;
  launcher?: EngineLauncher;
}

export async function runTactics(
  cases: readonly TacticalCase[],
  options: TacticsOptions,
  callbacks: RunCallbacks<TacticalRow> = {}
): Promise<TacticsReport> {
  const rows = await withEngineSession(
    options.enginePath,
    {
      readTimeoutMs: options.timeoutMs,
      quitGraceMs: options.quitGraceMs,
      launcher: options.launcher,
    },
    async (session) => {
      const results: TacticalRow[] = [];
      for (const [i, suiteCase] of cases.entries()) {
        const expected = await options.resolver.resolveAll(suiteCase.position, suiteCase.expectedSan);
        if (expected.size === 0) {
          logger.warn(`${suiteCase.id}: no expected move could be resolved`);
        }
        const got = await session.query(suiteCase.position, options.depth);
        const row: TacticalRow = {
          index: i + 1,
          id: suiteCase.id,
          expected: [...expected].sort(),
          got,
          solved: isSolved(got, expected),
        };
        results.push(row);
        callbacks.onResult?.(row);
        callbacks.onProgress?.(i + 1, cases.length);
      }
      return results;
    }
  );

  const solved = countSolved(rows);
  return {
    kind: "tactics",
    depth: options.depth,
    rows,
    solved,
    total: rows.length,
    verdict: verdict(solved === rows.length, options.failOnMiss ?? false),
  };
}

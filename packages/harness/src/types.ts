/**
 * Harness type definitions.
 */

import type { VersionInfo } from "./version";

// ── Suite records ───────────────────────────────────────────────────

/** One perft or telemetry case. `expectedNodes` of 0 means "not declared". */
export interface BenchmarkCase {
  readonly name?: string;
  readonly position: string;
  readonly depth: number;
  readonly expectedNodes: number;
  readonly maxTimeMs?: number;
  readonly minNps?: number;
}

export interface TacticalCase {
  readonly id: string;
  readonly position: string;
  /** Best moves in algebraic notation, as written in the suite file */
  readonly expectedSan: readonly string[];
}

// ── Samples ─────────────────────────────────────────────────────────

export interface PerftSample {
  readonly nodes: number;
  readonly timeMs: number;
  readonly nps: number;
}

// ── Verdicts ────────────────────────────────────────────────────────

export type PerftStatus = "eq" | "diff" | "ref" | "refdiff";
export type GateStatus = "PASS" | "FAIL" | "INFO";

export interface PerftComparisonRow {
  index: number;
  case: BenchmarkCase;
  /** Depth actually searched (declared depth, possibly capped) */
  depth: number;
  subject: PerftSample;
  reference: PerftSample;
  statuses: PerftStatus[];
  passed: boolean;
}

export interface TelemetryRow {
  index: number;
  case: BenchmarkCase;
  sample: PerftSample;
  statuses: GateStatus[];
  passed: boolean;
}

export interface TacticalRow {
  index: number;
  id: string;
  expected: string[];
  got: string;
  solved: boolean;
}

export interface SuiteVerdict {
  passed: boolean;
  exitCode: 0 | 1;
}

export interface PerftComparisonReport {
  kind: "perft-compare";
  rows: PerftComparisonRow[];
  verdict: SuiteVerdict;
}

export interface TelemetryReport {
  kind: "telemetry";
  rows: TelemetryRow[];
  verdict: SuiteVerdict;
}

export interface TacticsReport {
  kind: "tactics";
  depth: number;
  rows: TacticalRow[];
  solved: number;
  total: number;
  verdict: SuiteVerdict;
}

export type SuiteReport = PerftComparisonReport | TelemetryReport | TacticsReport;

/** What `--json` writes: the report plus the code version that produced it. */
export type SavedReport = SuiteReport & {
  timestamp: string;
  version: VersionInfo;
};

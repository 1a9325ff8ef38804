/**
 * Comparison policies and suite-level verdicts. Pure functions; the
 * runner feeds them samples.
 */

import type {
  BenchmarkCase,
  GateStatus,
  PerftSample,
  PerftStatus,
  SuiteVerdict,
  TacticalRow,
} from "./types";

// ── Cross-engine perft equality ─────────────────────────────────────

/**
 * `eq`/`diff` compares subject against reference. `ref`/`refdiff` compares
 * the subject against the suite's declared count, only when the declared
 * depth was searched and a count was declared.
 */
export function classifyPerft(
  subject: PerftSample,
  reference: PerftSample,
  executedDepth: number,
  suiteCase: BenchmarkCase
): PerftStatus[] {
  const statuses: PerftStatus[] = [subject.nodes === reference.nodes ? "eq" : "diff"];
  if (executedDepth === suiteCase.depth && suiteCase.expectedNodes !== 0) {
    statuses.push(subject.nodes === suiteCase.expectedNodes ? "ref" : "refdiff");
  }
  return statuses;
}

export function perftStatusesPass(statuses: readonly PerftStatus[]): boolean {
  return !statuses.includes("diff") && !statuses.includes("refdiff");
}

/** Depth actually searched when the suite depth is capped. */
export function effectiveDepth(declared: number, cap: number | undefined): number {
  return cap === undefined ? declared : Math.min(declared, cap);
}

// ── Threshold gates ─────────────────────────────────────────────────

/** One status per configured bound; INFO when the case has none. */
export function gateStatuses(suiteCase: BenchmarkCase, sample: PerftSample): GateStatus[] {
  const statuses: GateStatus[] = [];
  if (suiteCase.minNps !== undefined) {
    statuses.push(sample.nps >= suiteCase.minNps ? "PASS" : "FAIL");
  }
  if (suiteCase.maxTimeMs !== undefined) {
    statuses.push(sample.timeMs <= suiteCase.maxTimeMs ? "PASS" : "FAIL");
  }
  if (statuses.length === 0) statuses.push("INFO");
  return statuses;
}

export function gateStatusesPass(statuses: readonly GateStatus[]): boolean {
  return !statuses.includes("FAIL");
}

// ── Tactical membership ─────────────────────────────────────────────

export function isSolved(bestMove: string, expected: ReadonlySet<string>): boolean {
  return bestMove !== "" && expected.has(bestMove);
}

export function countSolved(rows: readonly TacticalRow[]): number {
  return rows.filter((r) => r.solved).length;
}

// ── Suite verdicts ──────────────────────────────────────────────────

export function verdict(passed: boolean, enforce = true): SuiteVerdict {
  return { passed, exitCode: passed || !enforce ? 0 : 1 };
}

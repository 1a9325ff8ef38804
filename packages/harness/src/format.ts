/**
 * CLI output formatting: fixed-width result tables and summaries.
 */

import type { PerftComparisonRow, TacticalRow, TacticsReport, TelemetryRow } from "./types";

function rule(header: string): string {
  return "-".repeat(header.length);
}

// ── Perft comparison ────────────────────────────────────────────────

export function perftCompareHeader(): string[] {
  const header =
    "#".padEnd(3) +
    "FEN".padEnd(35) +
    "dep".padEnd(4) +
    "Subject nodes".padStart(14) +
    "Subj ms".padStart(10) +
    "Ref nodes".padStart(14) +
    "Ref ms".padStart(10) +
    "status".padStart(10);
  return [header, rule(header)];
}

export function formatPerftCompareRow(row: PerftComparisonRow): string {
  return (
    String(row.index).padEnd(3) +
    row.case.position.padEnd(35) +
    String(row.depth).padEnd(4) +
    String(row.subject.nodes).padStart(14) +
    String(row.subject.timeMs).padStart(10) +
    String(row.reference.nodes).padStart(14) +
    String(row.reference.timeMs).padStart(10) +
    row.statuses.join(",").padStart(10)
  );
}

// ── Telemetry ───────────────────────────────────────────────────────

export function telemetryCaseLabel(row: TelemetryRow): string {
  return row.case.name ?? `case-${String(row.index).padStart(3, "0")}`;
}

export function telemetryHeader(): string[] {
  const header =
    "case".padEnd(14) +
    "depth".padStart(6) +
    "nodes".padStart(16) +
    "time(ms)".padStart(12) +
    "nps".padStart(12) +
    "status".padStart(12);
  return [header, rule(header)];
}

export function formatTelemetryRow(row: TelemetryRow): string {
  return (
    telemetryCaseLabel(row).padEnd(14) +
    String(row.case.depth).padStart(6) +
    String(row.sample.nodes).padStart(16) +
    String(row.sample.timeMs).padStart(12) +
    String(row.sample.nps).padStart(12) +
    row.statuses.join(",").padStart(12)
  );
}

// ── Tactics ─────────────────────────────────────────────────────────

export function formatTacticalRow(row: TacticalRow): string {
  const expected = row.expected.length > 0 ? `[${row.expected.join(", ")}]` : "none";
  return `${row.id}: ${row.solved ? "OK" : "MISS"} expected=${expected} got=${row.got || "(none)"}`;
}

export function formatTacticsSummary(report: TacticsReport): string {
  return `Solved ${report.solved} / ${report.total} at depth ${report.depth}`;
}

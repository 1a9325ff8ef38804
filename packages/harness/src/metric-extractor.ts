/**
 * Pull structured fields out of raw engine output.
 *
 * Each `key=value` token may sit anywhere in the text. A missing required
 * field is an ExtractionError carrying the output verbatim.
 */

import { ExtractionError } from "./errors";
import type { PerftSample } from "./types";

const NODES = /\bnodes=(\d+)/;
const TIME_MS = /\btime_ms=(\d+)/;
const NPS = /\bnps=(\d+)/;
const REFERENCE_NODES_LABEL = "Nodes searched:";

/** Counts above 2^53 lose precision as numbers, so they count as unparseable. */
function toSafeInt(digits: string, what: string, output: string): number {
  const n = Number(digits);
  if (!Number.isSafeInteger(n)) throw new ExtractionError(what, output);
  return n;
}

function matchInt(pattern: RegExp, text: string, what: string): number | undefined {
  const match = pattern.exec(text);
  return match ? toSafeInt(match[1], what, text) : undefined;
}

/** Nodes per second, never dividing by zero. */
export function deriveNps(nodes: number, timeMs: number): number {
  return Math.floor((nodes * 1000) / Math.max(timeMs, 1));
}

export function extractPerftNodes(output: string): number {
  const nodes = matchInt(NODES, output, "nodes");
  if (nodes === undefined) throw new ExtractionError("nodes", output);
  return nodes;
}

/**
 * Parse `nodes=… time_ms=… [nps=…]`. A reported time of zero is replaced
 * by the externally measured wall clock; a missing nps is derived.
 */
export function extractTelemetry(output: string, wallClockMs: number): PerftSample {
  const nodes = matchInt(NODES, output, "perft telemetry");
  const reportedMs = matchInt(TIME_MS, output, "perft telemetry");
  if (nodes === undefined || reportedMs === undefined) {
    throw new ExtractionError("perft telemetry", output);
  }

  const timeMs = reportedMs === 0 ? wallClockMs : reportedMs;
  const nps = matchInt(NPS, output, "perft telemetry") ?? deriveNps(nodes, timeMs);
  return { nodes, timeMs, nps };
}

/**
 * Reference engines print `Nodes searched: <n>` after `go perft`.
 * Only the last such line counts.
 */
export function extractReferenceNodes(output: string): number {
  const lines = output.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (!line.includes(REFERENCE_NODES_LABEL)) continue;
    const value = line.slice(line.indexOf(REFERENCE_NODES_LABEL) + REFERENCE_NODES_LABEL.length).trim();
    if (/^\d+$/.test(value)) return toSafeInt(value, "node summary", output);
    break;
  }
  throw new ExtractionError("node summary", output);
}

/** `bestmove e2e4 ponder e7e5` → "e2e4"; "" when the token is missing. */
export function extractBestMove(line: string): string {
  const parts = line.trim().split(/\s+/);
  return parts[0] === "bestmove" && parts.length >= 2 ? parts[1] : "";
}

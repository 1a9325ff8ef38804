import { describe, expect, it } from "vitest";

import { STARTPOS } from "../src/config";
import {
  formatPerftCompareRow,
  formatTacticalRow,
  formatTacticsSummary,
  formatTelemetryRow,
  perftCompareHeader,
  telemetryHeader,
} from "../src/format";
import type { TacticsReport, TelemetryRow } from "../src/types";

describe("telemetry table", () => {
  const row: TelemetryRow = {
    index: 1,
    case: { name: "startpos-d6", position: STARTPOS, depth: 6, expectedNodes: 0, minNps: 20_000_000 },
    sample: { nodes: 119060324, timeMs: 5000, nps: 23812064 },
    statuses: ["PASS"],
    passed: true,
  };

  it("aligns a row under the header", () => {
    const [header, rule] = telemetryHeader();

    expect(header).toBe("case           depth           nodes    time(ms)         nps      status");
    expect(rule).toBe("-".repeat(header.length));
    expect(formatTelemetryRow(row)).toBe(
      "startpos-d6        6       119060324        5000    23812064        PASS"
    );
    expect(formatTelemetryRow(row)).toHaveLength(header.length);
  });

  it("labels unnamed cases by index", () => {
    const unnamed: TelemetryRow = { ...row, index: 7, case: { position: STARTPOS, depth: 1, expectedNodes: 20 } };
    expect(formatTelemetryRow(unnamed).startsWith("case-007      ")).toBe(true);
  });
});

describe("perft comparison table", () => {
  it("joins statuses in the last column", () => {
    const line = formatPerftCompareRow({
      index: 2,
      case: { position: "8/8/8/8/8/8/8/K6k w - - 0 1", depth: 1, expectedNodes: 3 },
      depth: 1,
      subject: { nodes: 3, timeMs: 1, nps: 3000 },
      reference: { nodes: 4, timeMs: 2, nps: 2000 },
      statuses: ["diff", "ref"],
      passed: false,
    });

    expect(line.startsWith("2  8/8/8/8/8/8/8/K6k w - - 0 1        1   ")).toBe(true);
    expect(line.endsWith("  diff,ref")).toBe(true);
    expect(line).toHaveLength(perftCompareHeader()[0].length);
  });
});

describe("tactics output", () => {
  it("shows the expected moves and the engine's choice", () => {
    expect(formatTacticalRow({ index: 1, id: "T1", expected: ["g1g2", "h1g2"], got: "e2e4", solved: false })).toBe(
      "T1: MISS expected=[g1g2, h1g2] got=e2e4"
    );
    expect(formatTacticalRow({ index: 2, id: "T2", expected: [], got: "", solved: false })).toBe(
      "T2: MISS expected=none got=(none)"
    );
    expect(formatTacticalRow({ index: 3, id: "T3", expected: ["a1a8"], got: "a1a8", solved: true })).toBe(
      "T3: OK expected=[a1a8] got=a1a8"
    );
  });

  it("summarises the run", () => {
    const report: TacticsReport = {
      kind: "tactics",
      depth: 6,
      rows: [],
      solved: 8,
      total: 10,
      verdict: { passed: false, exitCode: 0 },
    };
    expect(formatTacticsSummary(report)).toBe("Solved 8 / 10 at depth 6");
  });
});

/**
 * Suite loading: perft (`fen|depth|nodes`), telemetry (JSON gates) and
 * tactical (EPD-like `... bm <moves>; id "<id>";`) files.
 *
 * Perft and telemetry loads are all-or-nothing: one malformed record fails
 * the whole load. Tactical lines that do not look like cases are skipped.
 */

import { existsSync, readFileSync } from "node:fs";
import { extname } from "node:path";
import { validateFen } from "chess.js";
import { z } from "zod";
import { POSITION_ALIASES } from "./config";
import { SetupError, SuiteFormatError } from "./errors";
import { logger } from "./logger";
import type { BenchmarkCase, TacticalCase } from "./types";

const BEST_MOVE_MARKER = " bm ";
const ID_MARKER = 'id "';
const INTEGER = /^\d+$/;

// ── Shared helpers ──────────────────────────────────────────────────

function readSuiteText(path: string): string {
  if (!existsSync(path)) {
    throw new SetupError(`Suite file not found: ${path}`);
  }
  const bytes = readFileSync(path);
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new SuiteFormatError(path, "file is not valid UTF-8", { cause: err });
  }
}

/**
 * Expand aliases such as `startpos`. EPD positions carry four fields;
 * they are validated as if the move counters were present.
 * Returns null when the position is not a plausible FEN.
 */
export function normalizePosition(raw: string): string | null {
  const trimmed = raw.trim();
  const position = POSITION_ALIASES[trimmed] ?? trimmed;
  const fields = position.split(/\s+/);
  const candidate = fields.length === 4 ? `${position} 0 1` : position;
  return validateFen(candidate).ok ? position : null;
}

function isCommentOrBlank(line: string): boolean {
  return line.length === 0 || line.startsWith("#");
}

// ── Perft suites ────────────────────────────────────────────────────

export function parsePerftSuite(text: string, source: string): BenchmarkCase[] {
  const cases: BenchmarkCase[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (isCommentOrBlank(line)) continue;

    const where = `${source}:${i + 1}`;
    const fields = line.split("|");
    if (fields.length !== 3) {
      throw new SuiteFormatError(
        where,
        `expected <position>|<depth>|<expected_node_count>, got ${JSON.stringify(line)}`
      );
    }

    const [rawPosition, rawDepth, rawNodes] = fields.map((f) => f.trim());
    if (!INTEGER.test(rawDepth) || Number(rawDepth) <= 0) {
      throw new SuiteFormatError(where, `depth must be a positive integer, got ${JSON.stringify(rawDepth)}`);
    }
    if (!INTEGER.test(rawNodes) || !Number.isSafeInteger(Number(rawNodes))) {
      throw new SuiteFormatError(where, `expected node count must be an integer, got ${JSON.stringify(rawNodes)}`);
    }
    const position = normalizePosition(rawPosition);
    if (position === null) {
      throw new SuiteFormatError(where, `not a valid position: ${JSON.stringify(rawPosition)}`);
    }

    cases.push({
      position,
      depth: Number(rawDepth),
      expectedNodes: Number(rawNodes),
    });
  }

  return cases;
}

export function loadPerftSuite(path: string): BenchmarkCase[] {
  return parsePerftSuite(readSuiteText(path), path);
}

// ── Telemetry suites ────────────────────────────────────────────────

const telemetryCaseSchema = z
  .object({
    name: z.string().min(1),
    position: z.string().min(1),
    depth: z.number().int().positive(),
    minNps: z.number().int().positive().optional(),
    maxTimeMs: z.number().int().positive().optional(),
  })
  .strict();

export const telemetrySuiteSchema = z.object({
  cases: z.array(telemetryCaseSchema).min(1),
});

export type TelemetrySuiteFile = z.infer<typeof telemetrySuiteSchema>;

export function parseTelemetrySuite(text: string, source: string): BenchmarkCase[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new SuiteFormatError(source, "not valid JSON", { cause: err });
  }

  const parsed = telemetrySuiteSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SuiteFormatError(source, issues);
  }

  return parsed.data.cases.map((c, i) => {
    const position = normalizePosition(c.position);
    if (position === null) {
      throw new SuiteFormatError(source, `cases.${i}.position: not a valid position: ${JSON.stringify(c.position)}`);
    }
    return {
      name: c.name,
      position,
      depth: c.depth,
      expectedNodes: 0,
      minNps: c.minNps,
      maxTimeMs: c.maxTimeMs,
    };
  });
}

export function loadTelemetrySuite(path: string): BenchmarkCase[] {
  return parseTelemetrySuite(readSuiteText(path), path);
}

/** JSON gate files and pipe-delimited perft files both describe benchmark cases. */
export function loadBenchmarkSuite(path: string): BenchmarkCase[] {
  return extname(path).toLowerCase() === ".json"
    ? loadTelemetrySuite(path)
    : loadPerftSuite(path);
}

// ── Tactical suites ─────────────────────────────────────────────────

export interface TacticalSuiteOptions {
  /** Keep at most this many cases, in file order */
  limit?: number;
}

export function parseTacticalSuite(
  text: string,
  options: TacticalSuiteOptions = {}
): TacticalCase[] {
  const { limit } = options;
  const cases: TacticalCase[] = [];
  if (limit !== undefined && limit <= 0) return cases;

  for (const line of text.split(/\r?\n/)) {
    const raw = line.trim();
    if (isCommentOrBlank(raw)) continue;

    const bmIdx = raw.indexOf(BEST_MOVE_MARKER);
    if (bmIdx === -1) continue;

    const rhs = raw.slice(bmIdx + BEST_MOVE_MARKER.length);
    const semi = rhs.indexOf(";");
    if (semi === -1) continue;

    const expectedSan = rhs
      .slice(0, semi)
      .replace(/,/g, " ")
      .split(/\s+/)
      .filter((token) => token.length > 0);
    if (expectedSan.length === 0) continue;

    const position = normalizePosition(raw.slice(0, bmIdx));
    if (position === null) {
      logger.debug(`Skipping tactical line with an invalid position: ${raw}`);
      continue;
    }

    let id = "";
    const idMarker = rhs.indexOf(ID_MARKER);
    if (idMarker !== -1) {
      const end = rhs.indexOf('"', idMarker + ID_MARKER.length);
      if (end !== -1) id = rhs.slice(idMarker + ID_MARKER.length, end);
    }

    cases.push({
      id: id || `case-${String(cases.length + 1).padStart(3, "0")}`,
      position,
      expectedSan,
    });
    if (limit !== undefined && cases.length >= limit) break;
  }

  return cases;
}

export function loadTacticalSuite(
  path: string,
  options: TacticalSuiteOptions = {}
): TacticalCase[] {
  return parseTacticalSuite(readSuiteText(path), options);
}

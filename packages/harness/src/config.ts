/**
 * Default paths, timeouts and run modes.
 *
 * Binary paths are relative to the working directory (the engine's build
 * tree); suite paths are relative to this package.
 */

import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const PACKAGE_ROOT = join(__dirname, "..");
export const SUITES_DIR = join(PACKAGE_ROOT, "suites");

export const STARTPOS = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

/** Suite-file spellings that stand for the initial position. */
export const POSITION_ALIASES: Readonly<Record<string, string>> = {
  start: STARTPOS,
  startpos: STARTPOS,
};

export const DEFAULT_BINARIES = {
  engine: "build/release/engine",
  perft: "build/release/engine-perft",
  converter: "build/release/san-to-uci",
} as const;

export const BINARY_ENV_VARS = {
  engine: "ENGINEGATE_ENGINE",
  perft: "ENGINEGATE_PERFT",
  converter: "ENGINEGATE_CONVERTER",
} as const;

export const DEFAULT_SUITES = {
  perft: join(SUITES_DIR, "perft.txt"),
  telemetry: join(SUITES_DIR, "telemetry.json"),
  tactics: join(SUITES_DIR, "tactics.epd"),
} as const;

/** Per-case timeouts, in seconds as the CLI takes them */
export const DEFAULT_TIMEOUT_SEC = {
  perftCompare: 120,
  telemetry: 600,
  tactics: 60,
} as const;

export const DEFAULT_REFERENCE_THREADS = 1;

/** Grace period for an engine to exit after `quit` */
export const QUIT_GRACE_MS = 5_000;

/** Bound on a single converter invocation */
export const CONVERTER_TIMEOUT_MS = 10_000;

export type TacticsMode = "quick" | "full";

export interface TacticsModeDefaults {
  limit: number | undefined;
  depth: number;
}

export const TACTICS_MODES: Record<TacticsMode, TacticsModeDefaults> = {
  quick: { limit: 10, depth: 3 },
  full: { limit: undefined, depth: 6 },
};

export function isTacticsMode(value: string): value is TacticsMode {
  return value === "quick" || value === "full";
}

/**
 * tactics command: best move at fixed depth against an EPD answer key.
 */

import { isTacticsMode, TACTICS_MODES } from "../config";
import { SetupError } from "../errors";
import { formatTacticalRow, formatTacticsSummary } from "../format";
import { MoveResolver } from "../move-resolver";
import { saveReport } from "../report";
import { runTactics } from "../runner";
import { loadTacticalSuite } from "../suite-loader";
import {
  applyLogLevel,
  parseOptionalPositiveInt,
  parseTimeoutMs,
  requireFile,
  type CommonOptions,
} from "./shared";

export interface TacticsCliOptions extends CommonOptions {
  mode: string;
  depth?: string;
  engine: string;
  converter: string;
  epd: string;
  limit?: string;
  verbose?: boolean;
  failOnMiss?: boolean;
}

export async function tactics(options: TacticsCliOptions): Promise<number> {
  applyLogLevel(options);

  const { mode } = options;
  if (!isTacticsMode(mode)) {
    throw new SetupError(`--mode must be "quick" or "full", got "${mode}"`);
  }
  requireFile(options.engine, "Engine");
  requireFile(options.converter, "Converter");
  requireFile(options.epd, "EPD file");

  const modeDefaults = TACTICS_MODES[mode];
  const limit = parseOptionalPositiveInt(options.limit, "--limit") ?? modeDefaults.limit;
  const depth = parseOptionalPositiveInt(options.depth, "--depth") ?? modeDefaults.depth;
  const timeoutMs = parseTimeoutMs(options.timeout);

  const cases = loadTacticalSuite(options.epd, { limit });
  if (cases.length === 0) {
    throw new SetupError(`No positions parsed from EPD: ${options.epd}`);
  }

  const report = await runTactics(
    cases,
    {
      enginePath: options.engine,
      depth,
      timeoutMs,
      resolver: new MoveResolver(options.converter),
      failOnMiss: options.failOnMiss,
    },
    {
      onResult: (row) => {
        if (options.verbose || !row.solved) console.log(formatTacticalRow(row));
      },
    }
  );

  console.log(formatTacticsSummary(report));

  if (options.json) {
    saveReport(options.json, report);
    console.log(`Report saved: ${options.json}`);
  }

  return report.verdict.exitCode;
}

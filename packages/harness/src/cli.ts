#!/usr/bin/env node

/**
 * Engine verification harness CLI: perft parity, throughput gates and
 * tactical suites against an external UCI engine.
 */

import { Command, Option } from "commander";
import {
  BINARY_ENV_VARS,
  DEFAULT_BINARIES,
  DEFAULT_REFERENCE_THREADS,
  DEFAULT_SUITES,
  DEFAULT_TIMEOUT_SEC,
} from "./config";
import { perftCompare, type PerftCompareCliOptions } from "./commands/perft-compare";
import { telemetry, type TelemetryCliOptions } from "./commands/telemetry";
import { tactics, type TacticsCliOptions } from "./commands/tactics";
import { runCommand } from "./commands/shared";

const program = new Command()
  .name("harness")
  .description("Engine verification harness")
  .version("0.1.0");

function perftBinaryOption(): Option {
  return new Option("--subject <path>", "Path to the one-shot perft executable")
    .env(BINARY_ENV_VARS.perft)
    .default(DEFAULT_BINARIES.perft);
}

program
  .command("perft-compare")
  .description("Compare subject perft counts against a reference UCI engine")
  .argument("<engine>", "Path to the reference UCI engine")
  .argument("[suite]", "Suite file (position|depth|expected)", DEFAULT_SUITES.perft)
  .addOption(perftBinaryOption())
  .option("--depth <n>", "Depth cap; runs min(suite depth, cap)")
  .option("--timeout <sec>", "Per-position timeout in seconds", String(DEFAULT_TIMEOUT_SEC.perftCompare))
  .option("--threads <n>", "Threads for the reference engine", String(DEFAULT_REFERENCE_THREADS))
  .option("--json <file>", "Also write a JSON report")
  .option("--debug", "Log protocol traffic and engine stderr")
  .action((engine: string, suite: string, options: PerftCompareCliOptions) =>
    runCommand(() => perftCompare(engine, suite, options))
  );

program
  .command("telemetry")
  .description("Run throughput/latency gates (reporting only unless --fail-on-gate)")
  .addOption(perftBinaryOption())
  .option("--suite <file>", "Gate suite (.json) or perft suite file", DEFAULT_SUITES.telemetry)
  .option("--timeout <sec>", "Per-case timeout in seconds", String(DEFAULT_TIMEOUT_SEC.telemetry))
  .option("--output <file>", "Append results to this telemetry log")
  .option("--fail-on-gate", "Exit with code 1 if any gate fails")
  .option("--json <file>", "Also write a JSON report")
  .option("--debug", "Log protocol traffic and engine stderr")
  .action((options: TelemetryCliOptions) => runCommand(() => telemetry(options)));

program
  .command("tactics")
  .description("Check the engine's best move against an EPD answer key")
  .addOption(
    new Option("--mode <mode>", "quick: first 10 positions at depth 3, full: all at depth 6")
      .choices(["quick", "full"])
      .default("quick")
  )
  .option("--depth <n>", "Search depth (overrides the mode default)")
  .addOption(
    new Option("--engine <path>", "Path to the UCI engine")
      .env(BINARY_ENV_VARS.engine)
      .default(DEFAULT_BINARIES.engine)
  )
  .addOption(
    new Option("--converter <path>", "Path to the algebraic-to-coordinate move converter")
      .env(BINARY_ENV_VARS.converter)
      .default(DEFAULT_BINARIES.converter)
  )
  .option("--epd <file>", "EPD suite path", DEFAULT_SUITES.tactics)
  .option("--limit <n>", "Cap positions (overrides --mode)")
  .option("--timeout <sec>", "Bound on each engine response in seconds", String(DEFAULT_TIMEOUT_SEC.tactics))
  .option("-v, --verbose", "Print every position, not just misses")
  .option("--fail-on-miss", "Exit with code 1 if any position is missed")
  .option("--json <file>", "Also write a JSON report")
  .option("--debug", "Log protocol traffic and engine stderr")
  .action((options: TacticsCliOptions) => runCommand(() => tactics(options)));

await program.parseAsync();

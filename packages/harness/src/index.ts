/**
 * Public API for programmatic use.
 *
 * The CLI (`cli.ts`) is the main entry point for human use.
 * This barrel export lets other tooling drive the harness as a library.
 */

export {
  loadPerftSuite,
  parsePerftSuite,
  loadTelemetrySuite,
  parseTelemetrySuite,
  loadBenchmarkSuite,
  loadTacticalSuite,
  parseTacticalSuite,
  normalizePosition,
} from "./suite-loader";
export type { TacticalSuiteOptions, TelemetrySuiteFile } from "./suite-loader";
export {
  extractPerftNodes,
  extractTelemetry,
  extractReferenceNodes,
  extractBestMove,
  deriveNps,
} from "./metric-extractor";
export { EngineSession, withEngineSession } from "./process-session";
export type { EngineSessionOptions, SessionState } from "./process-session";
export { runOneShot } from "./one-shot";
export type { OneShotOptions, OneShotResult } from "./one-shot";
export { spawnProcess } from "./process-launcher";
export type { EngineLauncher, EngineProcess, ProcessExit } from "./process-launcher";
export { MoveResolver } from "./move-resolver";
export {
  runPerftComparison,
  runTelemetry,
  runTactics,
  runSubjectPerft,
  runReferencePerft,
  runTelemetryCase,
} from "./runner";
export type { RunCallbacks, PerftCompareOptions, TelemetryOptions, TacticsOptions } from "./runner";
export { classifyPerft, gateStatuses, isSolved, verdict } from "./scoring";
export { appendTelemetryLog } from "./telemetry-log";
export { saveReport } from "./report";
export { captureVersionInfo } from "./version";
export type { VersionInfo } from "./version";
export {
  SetupError,
  SuiteFormatError,
  ProcessError,
  ProcessTimeoutError,
  ExtractionError,
} from "./errors";
export type {
  BenchmarkCase,
  TacticalCase,
  PerftSample,
  PerftStatus,
  GateStatus,
  PerftComparisonRow,
  TelemetryRow,
  TacticalRow,
  SuiteVerdict,
  PerftComparisonReport,
  TelemetryReport,
  TacticsReport,
  SuiteReport,
  SavedReport,
} from "./types";

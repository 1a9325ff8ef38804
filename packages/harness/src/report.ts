/**
 * `--json` output: the suite report plus the version that produced it.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { captureVersionInfo, type VersionInfo } from "./version";
import type { SavedReport, SuiteReport } from "./types";

export function toSavedReport(
  report: SuiteReport,
  version: VersionInfo = captureVersionInfo(),
  now = new Date()
): SavedReport {
  return { ...report, timestamp: now.toISOString(), version };
}

export function saveReport(path: string, report: SuiteReport): SavedReport {
  const saved = toSavedReport(report);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(saved, null, 2) + "\n");
  return saved;
}

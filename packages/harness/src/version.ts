/**
 * Runtime version/metadata capture for saved reports.
 *
 * Every JSON report includes a VersionInfo snapshot so a result can be
 * traced back to the harness code that produced it.
 */

import { execSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { PACKAGE_ROOT } from "./config";

export interface VersionInfo {
  /** Short git commit hash at runtime */
  gitCommit: string;
  /** Whether the working tree had uncommitted changes */
  gitDirty: boolean;
  /** @enginegate/harness package.json version */
  harnessVersion: string;
  nodeVersion: string;
}

const packageJsonSchema = z.object({ version: z.string() });

function readHarnessVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(PACKAGE_ROOT, "package.json"), "utf-8"));
    const parsed = packageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : "unknown";
  } catch {
    return "unknown";
  }
}

function git(args: string): string {
  return execSync(`git ${args}`, {
    encoding: "utf-8",
    timeout: 5000,
    stdio: ["pipe", "pipe", "pipe"],
  }).trim();
}

/**
 * Capture git and package version info at runtime.
 * Degrades to "unknown" outside a git checkout.
 */
export function captureVersionInfo(): VersionInfo {
  let gitCommit = "unknown";
  let gitDirty = false;
  try {
    gitCommit = git("rev-parse --short HEAD");
    gitDirty = git("status --porcelain").length > 0;
  } catch {
    // Not in a git repo or git not available
  }

  return {
    gitCommit,
    gitDirty,
    harnessVersion: readHarnessVersion(),
    nodeVersion: process.version,
  };
}

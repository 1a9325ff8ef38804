import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Append one run to the telemetry log: a timestamp line, the result
 * lines, then a blank separator line.
 */
export function appendTelemetryLog(path: string, lines: readonly string[], now = new Date()): void {
  mkdirSync(dirname(path), { recursive: true });
  appendFileSync(path, `${formatLogTimestamp(now)}\n${lines.join("\n")}\n\n`, "utf-8");
}

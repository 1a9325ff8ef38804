/**
 * perft-compare command: subject perft vs a reference UCI engine, plus the
 * suite's declared counts.
 */

import { formatPerftCompareRow, perftCompareHeader } from "../format";
import { saveReport } from "../report";
import { runPerftComparison } from "../runner";
import { loadPerftSuite } from "../suite-loader";
import {
  applyLogLevel,
  parseOptionalPositiveInt,
  parsePositiveInt,
  parseTimeoutMs,
  requireFile,
  type CommonOptions,
} from "./shared";

export interface PerftCompareCliOptions extends CommonOptions {
  subject: string;
  depth?: string;
  threads: string;
}

export async function perftCompare(
  engine: string,
  suitePath: string,
  options: PerftCompareCliOptions
): Promise<number> {
  applyLogLevel(options);
  requireFile(engine, "Reference engine");
  requireFile(options.subject, "Perft binary");

  const depthCap = parseOptionalPositiveInt(options.depth, "--depth");
  const timeoutMs = parseTimeoutMs(options.timeout);
  const referenceThreads = parsePositiveInt(options.threads, "--threads");
  const suite = loadPerftSuite(suitePath);

  for (const line of perftCompareHeader()) console.log(line);

  const report = await runPerftComparison(
    suite,
    {
      subjectPath: options.subject,
      referencePath: engine,
      timeoutMs,
      depthCap,
      referenceThreads,
    },
    { onResult: (row) => console.log(formatPerftCompareRow(row)) }
  );

  if (options.json) {
    saveReport(options.json, report);
    console.log(`\nReport saved: ${options.json}`);
  }

  return report.verdict.exitCode;
}

/**
 * Algebraic → coordinate move translation through the external converter.
 *
 * The converter reads two lines (position, then the algebraic move) and
 * prints one coordinate move. A failing invocation yields null and a
 * warning; it never aborts the suite.
 */

import { CONVERTER_TIMEOUT_MS } from "./config";
import { ProcessError } from "./errors";
import { logger } from "./logger";
import { runOneShot } from "./one-shot";
import type { EngineLauncher } from "./process-launcher";

export interface MoveResolverOptions {
  timeoutMs?: number;
  launcher?: EngineLauncher;
}

export class MoveResolver {
  private readonly cache = new Map<string, string | null>();
  private readonly timeoutMs: number;
  private readonly launcher: EngineLauncher | undefined;

  constructor(
    readonly converterPath: string,
    options: MoveResolverOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? CONVERTER_TIMEOUT_MS;
    this.launcher = options.launcher;
  }

  /** Coordinate form of `san` in `position`, or null when it cannot be resolved. */
  async resolve(position: string, san: string): Promise<string | null> {
    const key = `${position}\n${san}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const resolved = await this.invoke(position, san);
    this.cache.set(key, resolved);
    return resolved;
  }

  /** Resolve every move; failures are left out of the set. */
  async resolveAll(position: string, sans: readonly string[]): Promise<Set<string>> {
    const expected = new Set<string>();
    for (const san of sans) {
      const move = await this.resolve(position, san);
      if (move) expected.add(move);
    }
    return expected;
  }

  private async invoke(position: string, san: string): Promise<string | null> {
    try {
      const { stdout } = await runOneShot(this.converterPath, {
        input: `${position}\n${san}\n`,
        timeoutMs: this.timeoutMs,
        launcher: this.launcher,
      });
      const move = stdout.trim().split(/\r?\n/)[0]?.trim() ?? "";
      if (!move) {
        logger.warn(`[san-to-uci] ${san} failed: converter printed nothing`);
        return null;
      }
      return move;
    } catch (err) {
      if (!(err instanceof ProcessError)) throw err;
      logger.warn(`[san-to-uci] ${san} failed: ${err.stderr || err.message}`);
      return null;
    }
  }
}

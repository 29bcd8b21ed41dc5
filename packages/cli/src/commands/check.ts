/**
 * intguard check command - report instrumentation per module
 */

import { type Result, ok } from "@intguard/frontend";
import type { ResolvedConfig } from "../types.js";
import { compileProgram, formatStats } from "./compile.js";

export const checkCommand = (
  config: ResolvedConfig
): Result<{ guarded: number }, string> => {
  const compiled = compileProgram({ ...config, instrument: true });
  if (!compiled.ok) {
    return compiled;
  }

  const stats = compiled.value.stats ?? [];
  if (!config.quiet) {
    for (const stat of stats) {
      console.log(formatStats(stat));
    }
  }

  return ok({
    guarded: stats.reduce((sum, stat) => sum + stat.instrumented, 0),
  });
};

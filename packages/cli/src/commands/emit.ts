/**
 * intguard emit command - print the instrumented IR
 */

import { type Result, printModule, ok } from "@intguard/frontend";
import type { ResolvedConfig } from "../types.js";
import { compileProgram } from "./compile.js";

/**
 * Compile and print IR to stdout, unless quiet
 */
export const emitCommand = (
  config: ResolvedConfig
): Result<{ output: string }, string> => {
  const compiled = compileProgram(config);
  if (!compiled.ok) {
    return compiled;
  }

  const output = compiled.value.modules.map(printModule).join("\n");
  if (!config.quiet) {
    process.stdout.write(output);
  }
  return ok({ output });
};

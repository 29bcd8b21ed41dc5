/**
 * Shared compile step: source file to (instrumented) IR
 */

import {
  type Diagnostic,
  type IrModule,
  type ModuleInstrumentationStats,
  type Result,
  compileFiles,
  error,
  formatDiagnostic,
  ok,
  runOverflowCheckPass,
  verifyModules,
} from "@intguard/frontend";
import type { ResolvedConfig } from "../types.js";

export type CompiledProgram = {
  readonly modules: readonly IrModule[];
  /** Undefined when instrumentation is disabled */
  readonly stats: readonly ModuleInstrumentationStats[] | undefined;
};

export const formatDiagnostics = (diagnostics: readonly Diagnostic[]): string =>
  diagnostics.map(formatDiagnostic).join("\n");

/**
 * Compile the configured source file and run the overflow pass over it
 */
export const compileProgram = (
  config: ResolvedConfig
): Result<CompiledProgram, string> => {
  if (config.verbose) {
    console.log(`Compiling ${config.sourceFile}`);
    console.log(`  Source root: ${config.sourceRoot}`);
  }

  const irResult = compileFiles([config.sourceFile], {
    sourceRoot: config.sourceRoot,
    packagePath: config.packagePath,
  });
  if (!irResult.ok) {
    return error(`Compilation failed:\n${formatDiagnostics(irResult.error)}`);
  }

  if (!config.instrument) {
    if (config.verbose) {
      console.log("  Overflow instrumentation disabled");
    }
    return ok({ modules: irResult.value, stats: undefined });
  }

  const pass = runOverflowCheckPass(irResult.value, {
    exemptions: config.exemptions,
    multiply: config.multiply,
  });
  if (!pass.ok) {
    return error(
      `Overflow instrumentation failed:\n${formatDiagnostics(pass.diagnostics)}`
    );
  }

  const verification = verifyModules(pass.modules);
  if (!verification.ok) {
    return error(
      `Instrumented IR is malformed:\n${formatDiagnostics(verification.diagnostics)}`
    );
  }

  if (config.verbose) {
    for (const stat of pass.stats) {
      console.log(`  ${formatStats(stat)}`);
    }
  }

  return ok({ modules: pass.modules, stats: pass.stats });
};

/**
 * One line per module, e.g. `main.ts [main]: 3 guarded, 12 unchanged`
 */
export const formatStats = (stats: ModuleInstrumentationStats): string =>
  stats.exempt
    ? `${stats.filePath} [${stats.packagePath}]: exempt`
    : `${stats.filePath} [${stats.packagePath}]: ${stats.instrumented} guarded, ${stats.unchanged} unchanged`;

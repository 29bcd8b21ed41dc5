/**
 * intguard frontend - TypeScript parser, IR builder and overflow
 * instrumentation
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  formatLocation,
  collectDiagnostics,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./program.js";
export * from "./resolver.js";
export * from "./ir/index.js";

import * as path from "node:path";
import {
  CompilerOptions,
  SourceProgram,
  createProgram,
  createProgramFromSources,
} from "./program.js";
import { buildIr } from "./ir/builder.js";
import type { IrModule } from "./ir/types.js";
import { verifyModules } from "./ir/validation/index.js";
import {
  Diagnostic,
  DiagnosticsCollector,
  createDiagnostic,
} from "./types/diagnostic.js";
import { Result, ok, error } from "./types/result.js";

export type SourceCompileOptions = Partial<CompilerOptions> & {
  /** File name relative to the source root (default "main.ts") */
  readonly fileName?: string;
};

const lowerProgram = (
  programResult: Result<SourceProgram, DiagnosticsCollector>
): Result<readonly IrModule[], readonly Diagnostic[]> => {
  if (!programResult.ok) {
    return error(programResult.error.diagnostics);
  }

  const irResult = buildIr(programResult.value);
  if (!irResult.ok) {
    return irResult;
  }

  const verification = verifyModules(irResult.value);
  if (!verification.ok) {
    return error(verification.diagnostics);
  }

  return ok(irResult.value);
};

/**
 * Main entry point for compiling TypeScript files to IR
 */
export const compileFiles = (
  filePaths: readonly string[],
  options: CompilerOptions
): Result<readonly IrModule[], readonly Diagnostic[]> =>
  lowerProgram(createProgram(filePaths, options));

/**
 * Compile a single source text without touching the file system
 */
export const compileSource = (
  text: string,
  options: SourceCompileOptions = {}
): Result<IrModule, readonly Diagnostic[]> => {
  const sourceRoot = options.sourceRoot ?? "/src";
  const fileName = path.resolve(sourceRoot, options.fileName ?? "main.ts");
  const result = lowerProgram(
    createProgramFromSources(new Map([[fileName, text]]), {
      sourceRoot,
      packagePath: options.packagePath,
    })
  );
  if (!result.ok) {
    return result;
  }
  const [module] = result.value;
  return module === undefined
    ? error([
        createDiagnostic(
          "IG6001",
          "error",
          `Internal compiler error: no module built for ${fileName}`
        ),
      ])
    : ok(module);
};

/**
 * TypeScript compiler configuration
 */

import * as ts from "typescript";

/**
 * Default TypeScript compiler options.
 *
 * Only the parser is used: sources are type-checked during lowering with
 * the integer types of the source language, so no lib files are loaded
 * and imports are never followed.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  noLib: true,
  noResolve: true,
  types: [],
  skipLibCheck: true,
  allowJs: false,
  noEmit: true,
  isolatedModules: true,
};

/**
 * Program type definitions
 */

import * as ts from "typescript";

export type CompilerOptions = {
  readonly sourceRoot: string;
  /** Package path for every module; derived from the file location when absent */
  readonly packagePath?: string;
};

export type SourceProgram = {
  readonly program: ts.Program;
  readonly options: CompilerOptions;
  readonly sourceFiles: readonly ts.SourceFile[];
};

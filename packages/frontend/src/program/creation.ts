/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { Result, ok, error } from "../types/result.js";
import {
  Diagnostic,
  DiagnosticsCollector,
  collectDiagnostics,
  createDiagnostic,
} from "../types/diagnostic.js";
import { CompilerOptions, SourceProgram } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectTsDiagnostics } from "./diagnostics.js";

const fileLocation = (file: string) => ({
  file,
  line: 1,
  column: 1,
  length: 1,
});

/**
 * Create a program from source texts keyed by file path.
 * Nothing is read from disk.
 */
export const createProgramFromSources = (
  sources: ReadonlyMap<string, string>,
  options: CompilerOptions
): Result<SourceProgram, DiagnosticsCollector> => {
  const texts = new Map(
    [...sources].map(([fileName, text]) => [path.resolve(fileName), text])
  );

  const host = ts.createCompilerHost(defaultTsConfig);
  host.fileExists = (fileName: string): boolean => texts.has(fileName);
  host.readFile = (fileName: string): string | undefined =>
    texts.get(fileName);
  host.getSourceFile = (
    fileName: string,
    languageVersion: ts.ScriptTarget | ts.CreateSourceFileOptions
  ): ts.SourceFile | undefined => {
    const text = texts.get(fileName);
    return text === undefined
      ? undefined
      : ts.createSourceFile(fileName, text, languageVersion, true);
  };

  const program = ts.createProgram([...texts.keys()], defaultTsConfig, host);

  const diagnostics = collectTsDiagnostics(program);

  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  const sourceFiles = [...texts.keys()].flatMap((fileName) => {
    const sourceFile = program.getSourceFile(fileName);
    return sourceFile === undefined ? [] : [sourceFile];
  });

  return ok({
    program,
    options,
    sourceFiles,
  });
};

/**
 * Create a program from TypeScript source files on disk
 */
export const createProgram = (
  filePaths: readonly string[],
  options: CompilerOptions
): Result<SourceProgram, DiagnosticsCollector> => {
  const sources = new Map<string, string>();
  const problems: Diagnostic[] = [];

  for (const filePath of filePaths) {
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      problems.push(
        createDiagnostic(
          "IG1001",
          "error",
          `Source file not found: ${filePath}`,
          fileLocation(absolutePath)
        )
      );
      continue;
    }
    try {
      sources.set(absolutePath, fs.readFileSync(absolutePath, "utf-8"));
    } catch (err) {
      problems.push(
        createDiagnostic(
          "IG1002",
          "error",
          `Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
          fileLocation(absolutePath)
        )
      );
    }
  }

  if (problems.length > 0) {
    return error(collectDiagnostics(problems));
  }

  return createProgramFromSources(sources, options);
};

/**
 * Parser diagnostics
 */

import * as ts from "typescript";
import {
  Diagnostic,
  DiagnosticSeverity,
  DiagnosticsCollector,
  createDiagnostic,
  collectDiagnostics,
} from "../types/diagnostic.js";

const SEVERITY: Record<ts.DiagnosticCategory, DiagnosticSeverity | undefined> = {
  [ts.DiagnosticCategory.Error]: "error",
  [ts.DiagnosticCategory.Warning]: "warning",
  [ts.DiagnosticCategory.Message]: "info",
  [ts.DiagnosticCategory.Suggestion]: undefined,
};

/**
 * Convert one TypeScript diagnostic to an IG1003; suggestions are dropped.
 */
export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | undefined => {
  const severity = SEVERITY[tsDiag.category];
  if (severity === undefined) {
    return undefined;
  }

  const { file, start } = tsDiag;
  const position =
    file === undefined || start === undefined
      ? undefined
      : file.getLineAndCharacterOfPosition(start);

  return createDiagnostic(
    "IG1003",
    severity,
    ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n"),
    file === undefined || position === undefined
      ? undefined
      : {
          file: file.fileName,
          line: position.line + 1,
          column: position.character + 1,
          length: tsDiag.length ?? 1,
        }
  );
};

/**
 * Option and syntax errors of a program. Semantic diagnostics are never
 * requested since no lib is loaded.
 */
export const collectTsDiagnostics = (
  program: ts.Program
): DiagnosticsCollector =>
  collectDiagnostics(
    [...program.getOptionsDiagnostics(), ...program.getSyntacticDiagnostics()]
      .map(convertTsDiagnostic)
      .filter((d): d is Diagnostic => d !== undefined)
  );

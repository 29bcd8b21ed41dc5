/**
 * IR Builder helper functions
 */

import * as ts from "typescript";

/**
 * Check if a node has export modifier
 */
export const hasExportModifier = (node: ts.Node): boolean => {
  if (!ts.canHaveModifiers(node)) return false;
  const modifiers = ts.getModifiers(node);
  return (
    modifiers?.some((m) => m.kind === ts.SyntaxKind.ExportKeyword) ?? false
  );
};

/**
 * Readable name of a statement kind for diagnostics.
 * `ts.SyntaxKind[kind]` returns marker aliases such as FirstStatement.
 */
export const describeStatement = (stmt: ts.Statement): string => {
  if (ts.isVariableStatement(stmt)) return "variable declaration";
  if (ts.isClassDeclaration(stmt)) return "class declaration";
  if (ts.isEnumDeclaration(stmt)) return "enum declaration";
  if (ts.isModuleDeclaration(stmt)) return "namespace declaration";
  if (ts.isImportDeclaration(stmt) || ts.isImportEqualsDeclaration(stmt)) {
    return "import";
  }
  if (ts.isExportDeclaration(stmt) || ts.isExportAssignment(stmt)) {
    return "export";
  }
  if (ts.isExpressionStatement(stmt)) return "expression statement";
  return ts.SyntaxKind[stmt.kind] ?? "statement";
};

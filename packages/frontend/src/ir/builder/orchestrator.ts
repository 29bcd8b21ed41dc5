/**
 * IR Builder orchestration - Main module building logic
 */

import * as ts from "typescript";
import { relative } from "node:path";
import type { IrFunction, IrModule, IrParameter, IrType } from "../types/index.js";
import { SourceProgram } from "../../program/types.js";
import { getPackagePathFromFile } from "../../resolver/package-path.js";
import { Result, ok, error } from "../../types/result.js";
import { Diagnostic, createDiagnostic } from "../../types/diagnostic.js";
import {
  FunctionSignature,
  LoweringError,
  createLoweringContext,
  declareLocal,
  emit,
  failAt,
  getSourceLocation,
} from "./context.js";
import { finishBody, lowerStatement } from "./statements.js";
import { describeStatement, hasExportModifier } from "./helpers.js";
import { resolveTypeNode } from "./types.js";

export type IrBuildOptions = {
  readonly sourceRoot: string;
  /** Overrides the package path derived from the file location */
  readonly packagePath?: string;
};

const hasModifier = (node: ts.Node, kind: ts.SyntaxKind): boolean =>
  (ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined)?.some(
    (m) => m.kind === kind
  ) ?? false;

/**
 * Check a function declaration's shape and compute its signature.
 */
const readSignature = (
  sourceFile: ts.SourceFile,
  decl: ts.FunctionDeclaration
): FunctionSignature => {
  const name = decl.name?.text;
  if (name === undefined) {
    return failAt(sourceFile, decl, "IG2001", "Functions must be named");
  }
  if (decl.body === undefined) {
    return failAt(
      sourceFile,
      decl,
      "IG2001",
      `Function '${name}' has no body`,
      "Overloads and ambient declarations are not supported."
    );
  }
  if (decl.typeParameters !== undefined) {
    return failAt(sourceFile, decl, "IG2001", "Generic functions are not supported");
  }
  if (
    decl.asteriskToken !== undefined ||
    hasModifier(decl, ts.SyntaxKind.AsyncKeyword)
  ) {
    return failAt(
      sourceFile,
      decl,
      "IG2001",
      "Async functions and generators are not supported"
    );
  }
  if (hasModifier(decl, ts.SyntaxKind.DefaultKeyword)) {
    return failAt(sourceFile, decl, "IG2001", "Default exports are not supported");
  }
  if (decl.type === undefined) {
    return failAt(
      sourceFile,
      decl.name ?? decl,
      "IG2004",
      `Function '${name}' needs a return type annotation`
    );
  }

  const parameterTypes = decl.parameters.map((param): IrType => {
    if (!ts.isIdentifier(param.name)) {
      return failAt(sourceFile, param, "IG2001", "Destructuring is not supported");
    }
    if (
      param.questionToken !== undefined ||
      param.initializer !== undefined ||
      param.dotDotDotToken !== undefined
    ) {
      return failAt(
        sourceFile,
        param,
        "IG2001",
        "Optional, default and rest parameters are not supported"
      );
    }
    if (param.type === undefined) {
      return failAt(
        sourceFile,
        param,
        "IG2004",
        `Parameter '${param.name.text}' needs a type annotation`
      );
    }
    const type = resolveTypeNode(sourceFile, param.type);
    if (type.kind === "voidType") {
      return failAt(sourceFile, param.type, "IG2004", "Parameters cannot be void");
    }
    return type;
  });

  return {
    name,
    parameterTypes,
    returnType: resolveTypeNode(sourceFile, decl.type),
  };
};

const lowerFunction = (
  sourceFile: ts.SourceFile,
  decl: ts.FunctionDeclaration,
  signature: FunctionSignature,
  signatures: ReadonlyMap<string, FunctionSignature>
): IrFunction => {
  const paramNames = decl.parameters.map((p) => p.name.getText(sourceFile));
  const ctx = createLoweringContext(
    sourceFile,
    signatures,
    signature.returnType,
    new Set(paramNames)
  );

  // Arguments arrive in temporaries named after the parameters and are
  // stored into slots so the body can assign to them
  const parameters = decl.parameters.map((param, i): IrParameter => {
    const name = paramNames[i] ?? param.name.getText(sourceFile);
    const type = signature.parameterTypes[i];
    if (type === undefined) {
      return failAt(sourceFile, param, "IG6001", "Parameter without a type");
    }
    const local = declareLocal(ctx, param, name, type, false);
    emit(ctx, { kind: "store", local, value: name });
    return { name, type, temp: name };
  });

  decl.body?.statements.forEach((stmt) => lowerStatement(ctx, stmt));
  finishBody(ctx);

  return {
    kind: "function",
    name: signature.name,
    isExported: hasExportModifier(decl),
    parameters,
    returnType: signature.returnType,
    locals: ctx.locals,
    blocks: ctx.blocks,
    location: getSourceLocation(sourceFile, decl.name ?? decl),
  };
};

const isTypeOnlyStatement = (stmt: ts.Statement): boolean =>
  ts.isTypeAliasDeclaration(stmt) ||
  ts.isInterfaceDeclaration(stmt) ||
  (ts.isImportDeclaration(stmt) && stmt.importClause?.isTypeOnly === true) ||
  ts.isEmptyStatement(stmt);

const diagnosticOf = (
  sourceFile: ts.SourceFile,
  err: unknown
): Diagnostic =>
  err instanceof LoweringError
    ? err.diagnostic
    : createDiagnostic(
        "IG6001",
        "error",
        `Failed to build IR: ${err instanceof Error ? err.message : String(err)}`,
        {
          file: sourceFile.fileName,
          line: 1,
          column: 1,
          length: 1,
        }
      );

/**
 * Build IR module from TypeScript source file.
 *
 * Every function is lowered even when an earlier one fails, so one run
 * reports the problems of the whole file.
 */
export const buildIrModule = (
  sourceFile: ts.SourceFile,
  options: IrBuildOptions
): Result<IrModule, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const declarations: {
    readonly decl: ts.FunctionDeclaration;
    readonly signature: FunctionSignature;
  }[] = [];
  const signatures = new Map<string, FunctionSignature>();

  for (const stmt of sourceFile.statements) {
    if (isTypeOnlyStatement(stmt)) {
      continue;
    }
    if (!ts.isFunctionDeclaration(stmt)) {
      diagnostics.push(
        createDiagnostic(
          "IG2001",
          "error",
          `Unsupported top-level statement: ${describeStatement(stmt)}`,
          getSourceLocation(sourceFile, stmt),
          "Only function declarations are allowed at the top level."
        )
      );
      continue;
    }
    try {
      const signature = readSignature(sourceFile, stmt);
      if (signature.name === "panic") {
        failAt(
          sourceFile,
          stmt.name ?? stmt,
          "IG2009",
          "'panic' is a builtin and cannot be redeclared"
        );
      }
      if (signatures.has(signature.name)) {
        failAt(
          sourceFile,
          stmt.name ?? stmt,
          "IG2009",
          `Function '${signature.name}' is already declared`
        );
      }
      signatures.set(signature.name, signature);
      declarations.push({ decl: stmt, signature });
    } catch (err) {
      diagnostics.push(diagnosticOf(sourceFile, err));
    }
  }

  const functions: IrFunction[] = [];
  for (const { decl, signature } of declarations) {
    try {
      functions.push(lowerFunction(sourceFile, decl, signature, signatures));
    } catch (err) {
      diagnostics.push(diagnosticOf(sourceFile, err));
    }
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  // Compute relative file path from source root
  // Normalize to forward slashes for cross-platform consistency
  const filePath = relative(options.sourceRoot, sourceFile.fileName).replace(
    /\\/g,
    "/"
  );

  return ok({
    kind: "module",
    filePath,
    packagePath:
      options.packagePath ??
      getPackagePathFromFile(sourceFile.fileName, options.sourceRoot),
    functions,
  });
};

/**
 * Build IR for all source files in the program
 */
export const buildIr = (
  program: SourceProgram
): Result<readonly IrModule[], readonly Diagnostic[]> => {
  const modules: IrModule[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const sourceFile of program.sourceFiles) {
    const result = buildIrModule(sourceFile, program.options);
    if (result.ok) {
      modules.push(result.value);
    } else {
      diagnostics.push(...result.error);
    }
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok(modules);
};

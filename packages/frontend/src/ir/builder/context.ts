/**
 * Per-function lowering state.
 *
 * Lowering emits into the current block. After a terminator there is no
 * current block; anything emitted afterwards lands in a fresh block that
 * nothing branches to.
 */

import * as ts from "typescript";
import {
  Diagnostic,
  DiagnosticCode,
  SourceLocation,
  createDiagnostic,
} from "../../types/diagnostic.js";
import type {
  BlockId,
  IrBlock,
  IrInstruction,
  IrLocal,
  IrTerminator,
  IrType,
  TempId,
} from "../types/index.js";

export type FunctionSignature = {
  readonly name: string;
  readonly parameterTypes: readonly IrType[];
  readonly returnType: IrType;
};

export type TypedValue = {
  readonly temp: TempId;
  readonly type: IrType;
};

type LocalBinding = {
  readonly local: string;
  readonly type: IrType;
  readonly isConst: boolean;
};

type LoopTargets = {
  readonly breakTarget: BlockId;
  readonly continueTarget: BlockId;
};

type OpenBlock = {
  readonly id: BlockId;
  readonly instructions: IrInstruction[];
};

export type LoweringContext = {
  readonly sourceFile: ts.SourceFile;
  readonly signatures: ReadonlyMap<string, FunctionSignature>;
  readonly returnType: IrType;
  readonly locals: IrLocal[];
  readonly blocks: IrBlock[];
  readonly scopes: Map<string, LocalBinding>[];
  readonly loops: LoopTargets[];
  readonly localNames: Set<string>;
  /** Temporary names taken by parameters */
  readonly reservedTemps: ReadonlySet<string>;
  current: OpenBlock | undefined;
  nextTemp: number;
  nextBlock: number;
};

/**
 * Thrown inside a function body; the orchestrator turns it into a
 * diagnostic for that function and moves on to the next one.
 */
export class LoweringError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "LoweringError";
    this.diagnostic = diagnostic;
  }
}

export const getSourceLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const start = node.getStart(sourceFile);
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

export const failAt = (
  sourceFile: ts.SourceFile,
  node: ts.Node,
  code: DiagnosticCode,
  message: string,
  hint?: string
): never => {
  throw new LoweringError(
    createDiagnostic(
      code,
      "error",
      message,
      getSourceLocation(sourceFile, node),
      hint
    )
  );
};

export const fail = (
  ctx: LoweringContext,
  node: ts.Node,
  code: DiagnosticCode,
  message: string,
  hint?: string
): never => failAt(ctx.sourceFile, node, code, message, hint);

export const createLoweringContext = (
  sourceFile: ts.SourceFile,
  signatures: ReadonlyMap<string, FunctionSignature>,
  returnType: IrType,
  reservedTemps: ReadonlySet<string> = new Set()
): LoweringContext => ({
  sourceFile,
  signatures,
  returnType,
  reservedTemps,
  locals: [],
  blocks: [],
  scopes: [new Map()],
  loops: [],
  localNames: new Set(),
  current: { id: "entry", instructions: [] },
  nextTemp: 0,
  nextBlock: 0,
});

export const newTemp = (ctx: LoweringContext): TempId => {
  let temp = `t${ctx.nextTemp++}`;
  while (ctx.reservedTemps.has(temp)) {
    temp = `t${ctx.nextTemp++}`;
  }
  return temp;
};

export const newBlock = (ctx: LoweringContext, hint: string): BlockId =>
  `${hint}.${ctx.nextBlock++}`;

export const emit = (ctx: LoweringContext, inst: IrInstruction): void => {
  if (ctx.current === undefined) {
    ctx.current = { id: newBlock(ctx, "dead"), instructions: [] };
  }
  ctx.current.instructions.push(inst);
};

export const terminate = (
  ctx: LoweringContext,
  terminator: IrTerminator
): void => {
  if (ctx.current === undefined) {
    return;
  }
  ctx.blocks.push({
    id: ctx.current.id,
    instructions: ctx.current.instructions,
    terminator,
  });
  ctx.current = undefined;
};

export const startBlock = (ctx: LoweringContext, id: BlockId): void => {
  terminate(ctx, { kind: "jump", target: id });
  ctx.current = { id, instructions: [] };
};

export const isTerminated = (ctx: LoweringContext): boolean =>
  ctx.current === undefined;

export const pushScope = (ctx: LoweringContext): void => {
  ctx.scopes.push(new Map());
};

export const popScope = (ctx: LoweringContext): void => {
  ctx.scopes.pop();
};

export const pushLoop = (
  ctx: LoweringContext,
  breakTarget: BlockId,
  continueTarget: BlockId
): void => {
  ctx.loops.push({ breakTarget, continueTarget });
};

export const popLoop = (ctx: LoweringContext): void => {
  ctx.loops.pop();
};

export const currentLoop = (ctx: LoweringContext): LoopTargets | undefined =>
  ctx.loops[ctx.loops.length - 1];

/**
 * Declare a source variable in the innermost scope and allocate its slot.
 * Shadowing variables get distinct slot names.
 */
export const declareLocal = (
  ctx: LoweringContext,
  node: ts.Node,
  name: string,
  type: IrType,
  isConst: boolean
): string => {
  const scope = ctx.scopes[ctx.scopes.length - 1];
  if (scope === undefined) {
    return fail(ctx, node, "IG6001", "No scope to declare a variable in");
  }
  if (scope.has(name)) {
    return fail(ctx, node, "IG2009", `'${name}' is already declared`);
  }

  let local = name;
  for (let n = 1; ctx.localNames.has(local); n++) {
    local = `${name}.${n}`;
  }
  ctx.localNames.add(local);
  ctx.locals.push({ name: local, type });
  scope.set(name, { local, type, isConst });
  return local;
};

/**
 * A slot for a value merged from several blocks (&&, ||, ?:).
 */
export const declareMergeSlot = (
  ctx: LoweringContext,
  hint: string,
  type: IrType
): string => {
  let local = `$${hint}`;
  for (let n = 1; ctx.localNames.has(local); n++) {
    local = `$${hint}.${n}`;
  }
  ctx.localNames.add(local);
  ctx.locals.push({ name: local, type });
  return local;
};

export const lookupLocal = (
  ctx: LoweringContext,
  name: string
): LocalBinding | undefined => {
  for (let i = ctx.scopes.length - 1; i >= 0; i--) {
    const binding = ctx.scopes[i]?.get(name);
    if (binding !== undefined) {
      return binding;
    }
  }
  return undefined;
};

/**
 * Statement lowering
 */

import * as ts from "typescript";
import { IrType, voidType } from "../types/index.js";
import { printType } from "../printer.js";
import {
  LoweringContext,
  currentLoop,
  declareLocal,
  emit,
  fail,
  isTerminated,
  newBlock,
  popLoop,
  popScope,
  pushLoop,
  pushScope,
  startBlock,
  terminate,
} from "./context.js";
import {
  expectType,
  lowerCall,
  lowerCondition,
  lowerExpression,
  peekType,
  zeroValue,
} from "./expressions.js";
import { DEFAULT_INT_TYPE, resolveTypeNode } from "./types.js";
import { describeStatement } from "./helpers.js";

const lowerVariableStatement = (
  ctx: LoweringContext,
  stmt: ts.VariableStatement
): void => {
  const list = stmt.declarationList;
  const isConst = (list.flags & ts.NodeFlags.Const) !== 0;
  const isLet = (list.flags & ts.NodeFlags.Let) !== 0;
  if (!isConst && !isLet) {
    return fail(ctx, list, "IG2001", "'var' is not supported", "Use 'let'.");
  }

  for (const decl of list.declarations) {
    if (!ts.isIdentifier(decl.name)) {
      return fail(ctx, decl.name, "IG2001", "Destructuring is not supported");
    }
    const annotated: IrType | undefined =
      decl.type === undefined
        ? undefined
        : resolveTypeNode(ctx.sourceFile, decl.type);
    const init = decl.initializer;
    if (init === undefined && isConst) {
      return fail(ctx, decl, "IG2001", "'const' declarations must be initialized");
    }

    const type =
      annotated ??
      (init === undefined ? undefined : peekType(ctx, init)) ??
      DEFAULT_INT_TYPE;
    if (type.kind === "voidType" || type.kind === "stringType") {
      return fail(
        ctx,
        decl,
        "IG2011",
        `Variables cannot have type '${printType(type)}'`
      );
    }

    // The initializer is lowered before the name comes into scope
    const value =
      init === undefined
        ? zeroValue(ctx, type)
        : expectType(ctx, init, lowerExpression(ctx, init, type), type);
    const local = declareLocal(ctx, decl.name, decl.name.text, type, isConst);
    emit(ctx, { kind: "store", local, value: value.temp });
  }
};

const lowerReturn = (ctx: LoweringContext, stmt: ts.ReturnStatement): void => {
  if (stmt.expression === undefined) {
    if (ctx.returnType.kind !== "voidType") {
      return fail(
        ctx,
        stmt,
        "IG2011",
        `Function must return a value of type '${printType(ctx.returnType)}'`
      );
    }
    terminate(ctx, { kind: "return" });
    return;
  }
  if (ctx.returnType.kind === "voidType") {
    return fail(ctx, stmt, "IG2011", "A void function cannot return a value");
  }
  const value = expectType(
    ctx,
    stmt.expression,
    lowerExpression(ctx, stmt.expression, ctx.returnType),
    ctx.returnType
  );
  terminate(ctx, { kind: "return", value: value.temp });
};

const lowerIf = (ctx: LoweringContext, stmt: ts.IfStatement): void => {
  const condition = lowerCondition(ctx, stmt.expression);
  const thenBlock = newBlock(ctx, "if.then");
  const elseBlock =
    stmt.elseStatement === undefined ? undefined : newBlock(ctx, "if.else");
  const end = newBlock(ctx, "if.end");

  terminate(ctx, {
    kind: "branch",
    condition: condition.temp,
    whenTrue: thenBlock,
    whenFalse: elseBlock ?? end,
  });

  startBlock(ctx, thenBlock);
  lowerScoped(ctx, stmt.thenStatement);
  terminate(ctx, { kind: "jump", target: end });

  if (elseBlock !== undefined && stmt.elseStatement !== undefined) {
    startBlock(ctx, elseBlock);
    lowerScoped(ctx, stmt.elseStatement);
  }
  startBlock(ctx, end);
};

const lowerWhile = (ctx: LoweringContext, stmt: ts.WhileStatement): void => {
  const head = newBlock(ctx, "while.cond");
  const body = newBlock(ctx, "while.body");
  const end = newBlock(ctx, "while.end");

  startBlock(ctx, head);
  const condition = lowerCondition(ctx, stmt.expression);
  terminate(ctx, {
    kind: "branch",
    condition: condition.temp,
    whenTrue: body,
    whenFalse: end,
  });

  startBlock(ctx, body);
  pushLoop(ctx, end, head);
  lowerScoped(ctx, stmt.statement);
  popLoop(ctx);
  terminate(ctx, { kind: "jump", target: head });

  startBlock(ctx, end);
};

const lowerFor = (ctx: LoweringContext, stmt: ts.ForStatement): void => {
  pushScope(ctx);

  const init = stmt.initializer;
  if (init !== undefined) {
    if (ts.isVariableDeclarationList(init)) {
      lowerVariableStatement(
        ctx,
        ts.factory.createVariableStatement(undefined, init)
      );
    } else {
      lowerExpression(ctx, init, undefined);
    }
  }

  const head = newBlock(ctx, "for.cond");
  const body = newBlock(ctx, "for.body");
  const step = newBlock(ctx, "for.step");
  const end = newBlock(ctx, "for.end");

  startBlock(ctx, head);
  if (stmt.condition === undefined) {
    terminate(ctx, { kind: "jump", target: body });
  } else {
    const condition = lowerCondition(ctx, stmt.condition);
    terminate(ctx, {
      kind: "branch",
      condition: condition.temp,
      whenTrue: body,
      whenFalse: end,
    });
  }

  startBlock(ctx, body);
  pushLoop(ctx, end, step);
  lowerScoped(ctx, stmt.statement);
  popLoop(ctx);

  startBlock(ctx, step);
  if (stmt.incrementor !== undefined) {
    lowerExpression(ctx, stmt.incrementor, undefined);
  }
  terminate(ctx, { kind: "jump", target: head });

  startBlock(ctx, end);
  popScope(ctx);
};

const lowerExpressionStatement = (
  ctx: LoweringContext,
  stmt: ts.ExpressionStatement
): void => {
  const expr = stmt.expression;
  if (ts.isCallExpression(expr)) {
    lowerCall(ctx, expr, true);
    return;
  }
  lowerExpression(ctx, expr, undefined);
};

const lowerJump = (
  ctx: LoweringContext,
  stmt: ts.BreakStatement | ts.ContinueStatement
): void => {
  const loop = currentLoop(ctx);
  const keyword = ts.isBreakStatement(stmt) ? "break" : "continue";
  if (loop === undefined) {
    return fail(ctx, stmt, "IG2010", `'${keyword}' outside of a loop`);
  }
  if (stmt.label !== undefined) {
    return fail(ctx, stmt.label, "IG2001", "Labeled statements are not supported");
  }
  terminate(ctx, {
    kind: "jump",
    target: keyword === "break" ? loop.breakTarget : loop.continueTarget,
  });
};

/** Lower a statement in its own block scope */
const lowerScoped = (ctx: LoweringContext, stmt: ts.Statement): void => {
  pushScope(ctx);
  lowerStatement(ctx, stmt);
  popScope(ctx);
};

export const lowerStatement = (
  ctx: LoweringContext,
  stmt: ts.Statement
): void => {
  if (ts.isBlock(stmt)) {
    pushScope(ctx);
    stmt.statements.forEach((s) => lowerStatement(ctx, s));
    popScope(ctx);
    return;
  }
  if (ts.isVariableStatement(stmt)) {
    return lowerVariableStatement(ctx, stmt);
  }
  if (ts.isExpressionStatement(stmt)) {
    return lowerExpressionStatement(ctx, stmt);
  }
  if (ts.isReturnStatement(stmt)) {
    return lowerReturn(ctx, stmt);
  }
  if (ts.isIfStatement(stmt)) {
    return lowerIf(ctx, stmt);
  }
  if (ts.isWhileStatement(stmt)) {
    return lowerWhile(ctx, stmt);
  }
  if (ts.isForStatement(stmt)) {
    return lowerFor(ctx, stmt);
  }
  if (ts.isBreakStatement(stmt) || ts.isContinueStatement(stmt)) {
    return lowerJump(ctx, stmt);
  }
  if (ts.isEmptyStatement(stmt)) {
    return;
  }
  return fail(
    ctx,
    stmt,
    "IG2001",
    `Unsupported statement: ${describeStatement(stmt)}`
  );
};

/**
 * Close the function: falling off the end returns for void functions and
 * is unreachable otherwise.
 */
export const finishBody = (ctx: LoweringContext): void => {
  if (isTerminated(ctx)) {
    return;
  }
  terminate(
    ctx,
    ctx.returnType.kind === voidType.kind
      ? { kind: "return" }
      : { kind: "unreachable" }
  );
};

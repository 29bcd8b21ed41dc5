/**
 * Expression lowering
 *
 * Every expression is lowered left to right into temporaries, each
 * operand exactly once. Integer literals take their type from context;
 * the operands of a binary operator must have the same type (there is
 * no implicit promotion).
 */

import * as ts from "typescript";
import {
  BinaryOperator,
  CompareOperator,
  IrIntType,
  IrType,
  TempId,
  boolType,
  fitsInKind,
  intRange,
  typesEqual,
  voidType,
} from "../types/index.js";
import { printType } from "../printer.js";
import {
  LoweringContext,
  TypedValue,
  declareMergeSlot,
  emit,
  fail,
  getSourceLocation,
  lookupLocal,
  newBlock,
  newTemp,
  startBlock,
  terminate,
} from "./context.js";
import { DEFAULT_INT_TYPE, resolveTypeNode } from "./types.js";

const BINARY_TOKENS: ReadonlyMap<ts.SyntaxKind, BinaryOperator> = new Map([
  [ts.SyntaxKind.PlusToken, "add"],
  [ts.SyntaxKind.MinusToken, "sub"],
  [ts.SyntaxKind.AsteriskToken, "mul"],
  [ts.SyntaxKind.SlashToken, "div"],
  [ts.SyntaxKind.PercentToken, "rem"],
  [ts.SyntaxKind.AmpersandToken, "bitAnd"],
  [ts.SyntaxKind.BarToken, "bitOr"],
  [ts.SyntaxKind.CaretToken, "bitXor"],
  [ts.SyntaxKind.LessThanLessThanToken, "shl"],
  [ts.SyntaxKind.GreaterThanGreaterThanToken, "shr"],
]);

const COMPOUND_ASSIGNMENT_TOKENS: ReadonlyMap<ts.SyntaxKind, BinaryOperator> =
  new Map([
    [ts.SyntaxKind.PlusEqualsToken, "add"],
    [ts.SyntaxKind.MinusEqualsToken, "sub"],
    [ts.SyntaxKind.AsteriskEqualsToken, "mul"],
    [ts.SyntaxKind.SlashEqualsToken, "div"],
    [ts.SyntaxKind.PercentEqualsToken, "rem"],
    [ts.SyntaxKind.AmpersandEqualsToken, "bitAnd"],
    [ts.SyntaxKind.BarEqualsToken, "bitOr"],
    [ts.SyntaxKind.CaretEqualsToken, "bitXor"],
    [ts.SyntaxKind.LessThanLessThanEqualsToken, "shl"],
    [ts.SyntaxKind.GreaterThanGreaterThanEqualsToken, "shr"],
  ]);

const COMPARE_TOKENS: ReadonlyMap<ts.SyntaxKind, CompareOperator> = new Map([
  [ts.SyntaxKind.EqualsEqualsEqualsToken, "eq"],
  [ts.SyntaxKind.EqualsEqualsToken, "eq"],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, "ne"],
  [ts.SyntaxKind.ExclamationEqualsToken, "ne"],
  [ts.SyntaxKind.LessThanToken, "lt"],
  [ts.SyntaxKind.LessThanEqualsToken, "le"],
  [ts.SyntaxKind.GreaterThanToken, "gt"],
  [ts.SyntaxKind.GreaterThanEqualsToken, "ge"],
]);

const isShift = (operator: BinaryOperator): boolean =>
  operator === "shl" || operator === "shr";

/**
 * Parse an integer literal lexeme (decimal, hex, binary, octal,
 * with optional `_` separators). Returns undefined for anything else.
 */
export const parseIntegerLexeme = (text: string): bigint | undefined => {
  const clean = text.replace(/_/g, "");
  const isInteger =
    /^[0-9]+$/.test(clean) ||
    /^0[xX][0-9a-fA-F]+$/.test(clean) ||
    /^0[bB][01]+$/.test(clean) ||
    /^0[oO][0-7]+$/.test(clean);
  return isInteger ? BigInt(clean) : undefined;
};

type IntValue = {
  readonly temp: TempId;
  readonly type: IrIntType;
};

const intTypeOrUndefined = (
  type: IrType | undefined
): IrIntType | undefined =>
  type !== undefined && type.kind === "intType" ? type : undefined;

/**
 * The type an expression will have, without lowering it.
 * Undefined for expressions whose type comes from context (literals).
 */
export const peekType = (
  ctx: LoweringContext,
  node: ts.Expression
): IrType | undefined => {
  if (ts.isParenthesizedExpression(node)) {
    return peekType(ctx, node.expression);
  }
  if (ts.isIdentifier(node)) {
    return lookupLocal(ctx, node.text)?.type;
  }
  if (
    node.kind === ts.SyntaxKind.TrueKeyword ||
    node.kind === ts.SyntaxKind.FalseKeyword
  ) {
    return boolType;
  }
  if (ts.isCallExpression(node) && ts.isIdentifier(node.expression)) {
    return ctx.signatures.get(node.expression.text)?.returnType;
  }
  if (ts.isAsExpression(node)) {
    return resolveTypeNode(ctx.sourceFile, node.type);
  }
  if (ts.isPrefixUnaryExpression(node)) {
    return node.operator === ts.SyntaxKind.ExclamationToken
      ? boolType
      : peekType(ctx, node.operand);
  }
  if (ts.isPostfixUnaryExpression(node)) {
    return peekType(ctx, node.operand);
  }
  if (ts.isConditionalExpression(node)) {
    return peekType(ctx, node.whenTrue) ?? peekType(ctx, node.whenFalse);
  }
  if (ts.isBinaryExpression(node)) {
    const token = node.operatorToken.kind;
    if (
      COMPARE_TOKENS.has(token) ||
      token === ts.SyntaxKind.AmpersandAmpersandToken ||
      token === ts.SyntaxKind.BarBarToken
    ) {
      return boolType;
    }
    if (
      token === ts.SyntaxKind.EqualsToken ||
      COMPOUND_ASSIGNMENT_TOKENS.has(token)
    ) {
      return peekType(ctx, node.left);
    }
    const operator = BINARY_TOKENS.get(token);
    if (operator !== undefined && isShift(operator)) {
      return peekType(ctx, node.left);
    }
    return peekType(ctx, node.left) ?? peekType(ctx, node.right);
  }
  return undefined;
};

export const expectType = (
  ctx: LoweringContext,
  node: ts.Node,
  value: TypedValue,
  expected: IrType
): TypedValue => {
  if (!typesEqual(value.type, expected)) {
    return fail(
      ctx,
      node,
      "IG2011",
      `Type '${printType(value.type)}' is not assignable to type '${printType(expected)}'`,
      "Convert explicitly with 'as'."
    );
  }
  return value;
};

const lowerIntLiteral = (
  ctx: LoweringContext,
  node: ts.Node,
  value: bigint,
  expected: IrType | undefined
): TypedValue => {
  if (expected !== undefined && expected.kind !== "intType") {
    return fail(
      ctx,
      node,
      "IG2011",
      `Integer literal is not assignable to type '${printType(expected)}'`
    );
  }
  const type = intTypeOrUndefined(expected) ?? DEFAULT_INT_TYPE;
  if (!fitsInKind(value, type.intKind)) {
    const range = intRange(type.intKind);
    return fail(
      ctx,
      node,
      "IG2002",
      `Literal ${value} is out of range for type ${printType(type)} (valid range: ${range.min} to ${range.max})`
    );
  }
  const dest = newTemp(ctx);
  emit(ctx, { kind: "constInt", dest, type, value });
  return { temp: dest, type };
};

const literalValue = (
  ctx: LoweringContext,
  node: ts.NumericLiteral
): bigint => {
  const value = parseIntegerLexeme(node.text);
  if (value === undefined) {
    return fail(
      ctx,
      node,
      "IG2001",
      `Literal '${node.getText(ctx.sourceFile)}' is not an integer`,
      "Floating-point values are not supported."
    );
  }
  return value;
};

/** A numeric literal, possibly negated and parenthesized */
const asLiteral = (
  ctx: LoweringContext,
  node: ts.Expression
): bigint | undefined => {
  if (ts.isParenthesizedExpression(node)) {
    return asLiteral(ctx, node.expression);
  }
  if (ts.isNumericLiteral(node)) {
    return literalValue(ctx, node);
  }
  if (
    ts.isPrefixUnaryExpression(node) &&
    node.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(node.operand)
  ) {
    return -literalValue(ctx, node.operand);
  }
  return undefined;
};

const requireInt = (
  ctx: LoweringContext,
  node: ts.Node,
  value: TypedValue,
  what: string
): IntValue => {
  const type = value.type;
  if (type.kind !== "intType") {
    return fail(
      ctx,
      node,
      "IG2011",
      `${what} requires an integer operand, got '${printType(type)}'`
    );
  }
  return { temp: value.temp, type };
};

const lowerBinary = (
  ctx: LoweringContext,
  node: ts.BinaryExpression,
  operator: BinaryOperator,
  expected: IrType | undefined
): TypedValue => {
  const type =
    peekType(ctx, node.left) ??
    (isShift(operator) ? undefined : peekType(ctx, node.right)) ??
    intTypeOrUndefined(expected) ??
    DEFAULT_INT_TYPE;
  const symbol = node.operatorToken.getText(ctx.sourceFile);

  const left = requireInt(
    ctx,
    node.left,
    lowerExpression(ctx, node.left, type),
    `Operator '${symbol}'`
  );
  const rightType = isShift(operator)
    ? (peekType(ctx, node.right) ?? left.type)
    : left.type;
  const right = requireInt(
    ctx,
    node.right,
    lowerExpression(ctx, node.right, rightType),
    `Operator '${symbol}'`
  );

  if (!isShift(operator) && !typesEqual(left.type, right.type)) {
    return fail(
      ctx,
      node,
      "IG2003",
      `Operands of '${symbol}' have different types '${printType(left.type)}' and '${printType(right.type)}'`,
      "Convert one operand explicitly with 'as'."
    );
  }

  const dest = newTemp(ctx);
  emit(ctx, {
    kind: "binary",
    dest,
    operator,
    left: left.temp,
    right: right.temp,
    type: left.type,
    location: getSourceLocation(ctx.sourceFile, node),
  });
  return { temp: dest, type: left.type };
};

const lowerCompare = (
  ctx: LoweringContext,
  node: ts.BinaryExpression,
  operator: CompareOperator
): TypedValue => {
  const type =
    peekType(ctx, node.left) ?? peekType(ctx, node.right) ?? DEFAULT_INT_TYPE;
  const left = lowerExpression(ctx, node.left, type);
  const right = lowerExpression(ctx, node.right, left.type);
  const symbol = node.operatorToken.getText(ctx.sourceFile);

  if (!typesEqual(left.type, right.type)) {
    return fail(
      ctx,
      node,
      "IG2003",
      `Operands of '${symbol}' have different types '${printType(left.type)}' and '${printType(right.type)}'`
    );
  }
  const ordered = operator !== "eq" && operator !== "ne";
  if (
    left.type.kind !== "intType" &&
    (ordered || left.type.kind !== "boolType")
  ) {
    return fail(
      ctx,
      node,
      "IG2011",
      `Operator '${symbol}' cannot be applied to type '${printType(left.type)}'`
    );
  }

  const dest = newTemp(ctx);
  emit(ctx, {
    kind: "compare",
    dest,
    operator,
    left: left.temp,
    right: right.temp,
    operandType: left.type,
  });
  return { temp: dest, type: boolType };
};

export const lowerCondition = (
  ctx: LoweringContext,
  node: ts.Expression
): TypedValue =>
  expectType(ctx, node, lowerExpression(ctx, node, boolType), boolType);

const lowerLogical = (
  ctx: LoweringContext,
  node: ts.BinaryExpression,
  isAnd: boolean
): TypedValue => {
  const hint = isAnd ? "and" : "or";
  const slot = declareMergeSlot(ctx, hint, boolType);
  const left = lowerCondition(ctx, node.left);
  emit(ctx, { kind: "store", local: slot, value: left.temp });

  const rhs = newBlock(ctx, `${hint}.rhs`);
  const end = newBlock(ctx, `${hint}.end`);
  terminate(ctx, {
    kind: "branch",
    condition: left.temp,
    whenTrue: isAnd ? rhs : end,
    whenFalse: isAnd ? end : rhs,
  });

  startBlock(ctx, rhs);
  const right = lowerCondition(ctx, node.right);
  emit(ctx, { kind: "store", local: slot, value: right.temp });
  startBlock(ctx, end);

  const dest = newTemp(ctx);
  emit(ctx, { kind: "load", dest, local: slot, type: boolType });
  return { temp: dest, type: boolType };
};

const lowerConditional = (
  ctx: LoweringContext,
  node: ts.ConditionalExpression,
  expected: IrType | undefined
): TypedValue => {
  const condition = lowerCondition(ctx, node.condition);
  const type =
    expected ??
    peekType(ctx, node.whenTrue) ??
    peekType(ctx, node.whenFalse) ??
    DEFAULT_INT_TYPE;
  const slot = declareMergeSlot(ctx, "cond", type);

  const whenTrue = newBlock(ctx, "cond.true");
  const whenFalse = newBlock(ctx, "cond.false");
  const end = newBlock(ctx, "cond.end");
  terminate(ctx, {
    kind: "branch",
    condition: condition.temp,
    whenTrue,
    whenFalse,
  });

  startBlock(ctx, whenTrue);
  const trueValue = expectType(
    ctx,
    node.whenTrue,
    lowerExpression(ctx, node.whenTrue, type),
    type
  );
  emit(ctx, { kind: "store", local: slot, value: trueValue.temp });
  terminate(ctx, { kind: "jump", target: end });

  startBlock(ctx, whenFalse);
  const falseValue = expectType(
    ctx,
    node.whenFalse,
    lowerExpression(ctx, node.whenFalse, type),
    type
  );
  emit(ctx, { kind: "store", local: slot, value: falseValue.temp });
  startBlock(ctx, end);

  const dest = newTemp(ctx);
  emit(ctx, { kind: "load", dest, local: slot, type });
  return { temp: dest, type };
};

const assignableBinding = (ctx: LoweringContext, target: ts.Expression) => {
  if (!ts.isIdentifier(target)) {
    return fail(
      ctx,
      target,
      "IG2001",
      "Only variables can be assigned to"
    );
  }
  const binding = lookupLocal(ctx, target.text);
  if (binding === undefined) {
    return fail(ctx, target, "IG2005", `Cannot find name '${target.text}'`);
  }
  if (binding.isConst) {
    return fail(
      ctx,
      target,
      "IG2008",
      `Cannot assign to '${target.text}' because it is a constant`
    );
  }
  return binding;
};

const lowerAssignment = (
  ctx: LoweringContext,
  node: ts.BinaryExpression
): TypedValue => {
  const binding = assignableBinding(ctx, node.left);
  const value = expectType(
    ctx,
    node.right,
    lowerExpression(ctx, node.right, binding.type),
    binding.type
  );
  emit(ctx, { kind: "store", local: binding.local, value: value.temp });
  return value;
};

const lowerCompoundAssignment = (
  ctx: LoweringContext,
  node: ts.BinaryExpression,
  operator: BinaryOperator
): TypedValue => {
  const binding = assignableBinding(ctx, node.left);
  const symbol = node.operatorToken.getText(ctx.sourceFile);
  const current = newTemp(ctx);
  emit(ctx, {
    kind: "load",
    dest: current,
    local: binding.local,
    type: binding.type,
  });
  requireInt(
    ctx,
    node.left,
    { temp: current, type: binding.type },
    `Operator '${symbol}'`
  );

  const rightType = isShift(operator)
    ? (peekType(ctx, node.right) ?? binding.type)
    : binding.type;
  const right = requireInt(
    ctx,
    node.right,
    lowerExpression(ctx, node.right, rightType),
    `Operator '${symbol}'`
  );
  if (!isShift(operator)) {
    expectType(ctx, node.right, right, binding.type);
  }

  const dest = newTemp(ctx);
  emit(ctx, {
    kind: "binary",
    dest,
    operator,
    left: current,
    right: right.temp,
    type: binding.type,
    location: getSourceLocation(ctx.sourceFile, node),
  });
  emit(ctx, { kind: "store", local: binding.local, value: dest });
  return { temp: dest, type: binding.type };
};

const lowerIncrement = (
  ctx: LoweringContext,
  node: ts.PrefixUnaryExpression | ts.PostfixUnaryExpression,
  isPrefix: boolean
): TypedValue => {
  const binding = assignableBinding(ctx, node.operand);
  const operator =
    node.operator === ts.SyntaxKind.PlusPlusToken ? "add" : "sub";
  const current = newTemp(ctx);
  emit(ctx, {
    kind: "load",
    dest: current,
    local: binding.local,
    type: binding.type,
  });
  const type = requireInt(
    ctx,
    node.operand,
    { temp: current, type: binding.type },
    operator === "add" ? "Operator '++'" : "Operator '--'"
  ).type;

  const one = newTemp(ctx);
  const dest = newTemp(ctx);
  emit(ctx, { kind: "constInt", dest: one, type, value: 1n });
  emit(ctx, {
    kind: "binary",
    dest,
    operator,
    left: current,
    right: one,
    type,
    location: getSourceLocation(ctx.sourceFile, node),
  });
  emit(ctx, { kind: "store", local: binding.local, value: dest });
  return { temp: isPrefix ? dest : current, type };
};

const lowerPrefixUnary = (
  ctx: LoweringContext,
  node: ts.PrefixUnaryExpression,
  expected: IrType | undefined
): TypedValue => {
  switch (node.operator) {
    case ts.SyntaxKind.PlusPlusToken:
    case ts.SyntaxKind.MinusMinusToken:
      return lowerIncrement(ctx, node, true);

    case ts.SyntaxKind.PlusToken:
      return lowerExpression(ctx, node.operand, expected);

    case ts.SyntaxKind.ExclamationToken: {
      const operand = lowerCondition(ctx, node.operand);
      const dest = newTemp(ctx);
      emit(ctx, {
        kind: "unary",
        dest,
        operator: "not",
        operand: operand.temp,
        type: boolType,
      });
      return { temp: dest, type: boolType };
    }

    case ts.SyntaxKind.MinusToken:
    case ts.SyntaxKind.TildeToken: {
      const literal = asLiteral(ctx, node);
      if (literal !== undefined) {
        return lowerIntLiteral(ctx, node, literal, intTypeOrUndefined(expected));
      }
      const type =
        peekType(ctx, node.operand) ??
        intTypeOrUndefined(expected) ??
        DEFAULT_INT_TYPE;
      const isNeg = node.operator === ts.SyntaxKind.MinusToken;
      const operand = requireInt(
        ctx,
        node.operand,
        lowerExpression(ctx, node.operand, type),
        isNeg ? "Operator '-'" : "Operator '~'"
      );
      const dest = newTemp(ctx);
      emit(ctx, {
        kind: "unary",
        dest,
        operator: isNeg ? "neg" : "bitNot",
        operand: operand.temp,
        type: operand.type,
      });
      return { temp: dest, type: operand.type };
    }
  }
};

const lowerCast = (
  ctx: LoweringContext,
  node: ts.AsExpression
): TypedValue => {
  const target = resolveTypeNode(ctx.sourceFile, node.type);
  const literal = asLiteral(ctx, node.expression);
  if (literal !== undefined) {
    return lowerIntLiteral(ctx, node.expression, literal, target);
  }

  const value = lowerExpression(ctx, node.expression, undefined);
  if (typesEqual(value.type, target)) {
    return value;
  }
  if (value.type.kind === "intType" && target.kind === "intType") {
    const dest = newTemp(ctx);
    emit(ctx, {
      kind: "convert",
      dest,
      value: value.temp,
      from: value.type.intKind,
      to: target.intKind,
    });
    return { temp: dest, type: target };
  }
  return fail(
    ctx,
    node,
    "IG2011",
    `Cannot convert '${printType(value.type)}' to '${printType(target)}'`
  );
};

const lowerPanic = (ctx: LoweringContext, node: ts.CallExpression): void => {
  const [message, ...rest] = node.arguments;
  if (
    message === undefined ||
    rest.length > 0 ||
    !(ts.isStringLiteral(message) || ts.isNoSubstitutionTemplateLiteral(message))
  ) {
    return fail(
      ctx,
      node,
      "IG2007",
      "panic takes exactly one string literal argument"
    );
  }
  const dest = newTemp(ctx);
  emit(ctx, { kind: "constString", dest, value: message.text });
  emit(ctx, {
    kind: "call",
    callee: "panic",
    args: [dest],
    type: voidType,
    location: getSourceLocation(ctx.sourceFile, node),
  });
  terminate(ctx, { kind: "unreachable" });
};

/**
 * Lower a call. Returns undefined for calls without a value (void
 * functions, panic); those are only allowed where the value is discarded.
 */
export const lowerCall = (
  ctx: LoweringContext,
  node: ts.CallExpression,
  discard: boolean
): TypedValue | undefined => {
  if (!ts.isIdentifier(node.expression)) {
    return fail(ctx, node.expression, "IG2001", "Only named functions can be called");
  }
  const name = node.expression.text;

  if (name === "panic" && !ctx.signatures.has(name)) {
    if (!discard) {
      return fail(ctx, node, "IG2011", "panic does not produce a value");
    }
    lowerPanic(ctx, node);
    return undefined;
  }

  const signature = ctx.signatures.get(name);
  if (signature === undefined) {
    return fail(ctx, node.expression, "IG2006", `Cannot find function '${name}'`);
  }
  if (node.arguments.length !== signature.parameterTypes.length) {
    return fail(
      ctx,
      node,
      "IG2007",
      `Expected ${signature.parameterTypes.length} arguments to '${name}', got ${node.arguments.length}`
    );
  }

  const args = node.arguments.map((arg, i) => {
    const paramType = signature.parameterTypes[i] ?? DEFAULT_INT_TYPE;
    return expectType(ctx, arg, lowerExpression(ctx, arg, paramType), paramType)
      .temp;
  });

  if (signature.returnType.kind === "voidType") {
    if (!discard) {
      return fail(ctx, node, "IG2011", `'${name}' does not return a value`);
    }
    emit(ctx, {
      kind: "call",
      callee: name,
      args,
      type: signature.returnType,
      location: getSourceLocation(ctx.sourceFile, node),
    });
    return undefined;
  }

  const dest = newTemp(ctx);
  emit(ctx, {
    kind: "call",
    dest,
    callee: name,
    args,
    type: signature.returnType,
    location: getSourceLocation(ctx.sourceFile, node),
  });
  return { temp: dest, type: signature.returnType };
};

const lowerBinaryExpression = (
  ctx: LoweringContext,
  node: ts.BinaryExpression,
  expected: IrType | undefined
): TypedValue => {
  const token = node.operatorToken.kind;

  if (token === ts.SyntaxKind.EqualsToken) {
    return lowerAssignment(ctx, node);
  }
  const compound = COMPOUND_ASSIGNMENT_TOKENS.get(token);
  if (compound !== undefined) {
    return lowerCompoundAssignment(ctx, node, compound);
  }
  if (token === ts.SyntaxKind.AmpersandAmpersandToken) {
    return lowerLogical(ctx, node, true);
  }
  if (token === ts.SyntaxKind.BarBarToken) {
    return lowerLogical(ctx, node, false);
  }
  const compare = COMPARE_TOKENS.get(token);
  if (compare !== undefined) {
    return lowerCompare(ctx, node, compare);
  }
  const operator = BINARY_TOKENS.get(token);
  if (operator !== undefined) {
    return lowerBinary(ctx, node, operator, expected);
  }
  return fail(
    ctx,
    node.operatorToken,
    "IG2001",
    `Unsupported operator '${node.operatorToken.getText(ctx.sourceFile)}'`
  );
};

/**
 * Lower an expression that produces a value.
 */
export const lowerExpression = (
  ctx: LoweringContext,
  node: ts.Expression,
  expected: IrType | undefined
): TypedValue => {
  if (ts.isParenthesizedExpression(node)) {
    return lowerExpression(ctx, node.expression, expected);
  }
  if (ts.isNumericLiteral(node)) {
    return lowerIntLiteral(ctx, node, literalValue(ctx, node), expected);
  }
  if (
    node.kind === ts.SyntaxKind.TrueKeyword ||
    node.kind === ts.SyntaxKind.FalseKeyword
  ) {
    const dest = newTemp(ctx);
    emit(ctx, {
      kind: "constBool",
      dest,
      value: node.kind === ts.SyntaxKind.TrueKeyword,
    });
    return { temp: dest, type: boolType };
  }
  if (ts.isIdentifier(node)) {
    const binding = lookupLocal(ctx, node.text);
    if (binding === undefined) {
      return fail(ctx, node, "IG2005", `Cannot find name '${node.text}'`);
    }
    const dest = newTemp(ctx);
    emit(ctx, { kind: "load", dest, local: binding.local, type: binding.type });
    return { temp: dest, type: binding.type };
  }
  if (ts.isBinaryExpression(node)) {
    return lowerBinaryExpression(ctx, node, expected);
  }
  if (ts.isPrefixUnaryExpression(node)) {
    return lowerPrefixUnary(ctx, node, expected);
  }
  if (ts.isPostfixUnaryExpression(node)) {
    return lowerIncrement(ctx, node, false);
  }
  if (ts.isConditionalExpression(node)) {
    return lowerConditional(ctx, node, expected);
  }
  if (ts.isAsExpression(node)) {
    return lowerCast(ctx, node);
  }
  if (ts.isCallExpression(node)) {
    const value = lowerCall(ctx, node, false);
    if (value === undefined) {
      return fail(ctx, node, "IG2011", "Call does not produce a value");
    }
    return value;
  }
  return fail(
    ctx,
    node,
    "IG2001",
    `Unsupported expression: ${ts.SyntaxKind[node.kind]}`
  );
};

/** Default value of a declaration without initializer */
export const zeroValue = (ctx: LoweringContext, type: IrType): TypedValue => {
  const dest = newTemp(ctx);
  if (type.kind === "intType") {
    emit(ctx, { kind: "constInt", dest, type, value: 0n });
    return { temp: dest, type };
  }
  emit(ctx, { kind: "constBool", dest, value: false });
  return { temp: dest, type: boolType };
};

/**
 * IR instructions and terminators.
 *
 * Values live in temporaries, each defined by exactly one instruction.
 * Source-level variables live in function-level local slots and are
 * accessed through `load` and `store`.
 */

import type { SourceLocation } from "../../types/diagnostic.js";
import type { IrIntType, IrType } from "./ir-types.js";
import type { IntKind } from "./int-kind.js";

/** Temporary name, printed as `%name` */
export type TempId = string;

/** Basic block label */
export type BlockId = string;

export type IrInstruction =
  | IrConstIntInstruction
  | IrConstBoolInstruction
  | IrConstStringInstruction
  | IrLoadInstruction
  | IrStoreInstruction
  | IrBinaryInstruction
  | IrCompareInstruction
  | IrUnaryInstruction
  | IrConvertInstruction
  | IrCallInstruction;

export type IrConstIntInstruction = {
  readonly kind: "constInt";
  readonly dest: TempId;
  readonly type: IrIntType;
  readonly value: bigint;
};

export type IrConstBoolInstruction = {
  readonly kind: "constBool";
  readonly dest: TempId;
  readonly value: boolean;
};

export type IrConstStringInstruction = {
  readonly kind: "constString";
  readonly dest: TempId;
  readonly value: string;
};

export type IrLoadInstruction = {
  readonly kind: "load";
  readonly dest: TempId;
  readonly local: string;
  readonly type: IrType;
};

export type IrStoreInstruction = {
  readonly kind: "store";
  readonly local: string;
  readonly value: TempId;
};

export type ArithmeticOperator = "add" | "sub" | "mul" | "div";

export type BinaryOperator =
  | ArithmeticOperator
  | "rem"
  | "bitAnd"
  | "bitOr"
  | "bitXor"
  | "shl"
  | "shr";

export const BINARY_OPERATORS: readonly BinaryOperator[] = [
  "add",
  "sub",
  "mul",
  "div",
  "rem",
  "bitAnd",
  "bitOr",
  "bitXor",
  "shl",
  "shr",
];

export const isArithmeticOperator = (op: string): op is ArithmeticOperator =>
  op === "add" || op === "sub" || op === "mul" || op === "div";

/**
 * Overflow marker on integer arithmetic.
 * - "guarded": an original operation already wrapped by an overflow check
 * - "wrapping": arithmetic emitted by the overflow pass itself
 * Marked instructions are never instrumented again.
 */
export type OverflowMarker = "guarded" | "wrapping";

export type IrBinaryInstruction = {
  readonly kind: "binary";
  readonly dest: TempId;
  readonly operator: BinaryOperator;
  readonly left: TempId;
  readonly right: TempId;
  readonly type: IrType;
  readonly overflow?: OverflowMarker;
  readonly location?: SourceLocation;
};

export type CompareOperator = "eq" | "ne" | "lt" | "le" | "gt" | "ge";

export type IrCompareInstruction = {
  readonly kind: "compare";
  readonly dest: TempId;
  readonly operator: CompareOperator;
  readonly left: TempId;
  readonly right: TempId;
  /** Type of the operands; the result is always bool */
  readonly operandType: IrType;
};

export type UnaryOperator = "neg" | "not" | "bitNot";

export type IrUnaryInstruction = {
  readonly kind: "unary";
  readonly dest: TempId;
  readonly operator: UnaryOperator;
  readonly operand: TempId;
  readonly type: IrType;
};

/** Integer conversion: sign/zero extension or truncation */
export type IrConvertInstruction = {
  readonly kind: "convert";
  readonly dest: TempId;
  readonly value: TempId;
  readonly from: IntKind;
  readonly to: IntKind;
};

export type IrCallInstruction = {
  readonly kind: "call";
  /** Undefined for calls whose result is not used (void callees, panic) */
  readonly dest?: TempId;
  readonly callee: string;
  readonly args: readonly TempId[];
  readonly type: IrType;
  readonly location?: SourceLocation;
};

export type IrTerminator =
  | IrReturnTerminator
  | IrJumpTerminator
  | IrBranchTerminator
  | IrUnreachableTerminator;

export type IrReturnTerminator = {
  readonly kind: "return";
  readonly value?: TempId;
};

export type IrJumpTerminator = {
  readonly kind: "jump";
  readonly target: BlockId;
};

export type IrBranchTerminator = {
  readonly kind: "branch";
  readonly condition: TempId;
  readonly whenTrue: BlockId;
  readonly whenFalse: BlockId;
};

/** Control never reaches this point (e.g. after a panic call) */
export type IrUnreachableTerminator = {
  readonly kind: "unreachable";
};

/** Temporary defined by an instruction, if any */
export const definedTemp = (inst: IrInstruction): TempId | undefined =>
  inst.kind === "store" ? undefined : inst.dest;

/** Temporaries read by an instruction, in operand order */
export const usedTemps = (inst: IrInstruction): readonly TempId[] => {
  switch (inst.kind) {
    case "constInt":
    case "constBool":
    case "constString":
    case "load":
      return [];
    case "store":
      return [inst.value];
    case "binary":
    case "compare":
      return [inst.left, inst.right];
    case "unary":
      return [inst.operand];
    case "convert":
      return [inst.value];
    case "call":
      return inst.args;
  }
};

export const terminatorTargets = (
  terminator: IrTerminator
): readonly BlockId[] => {
  switch (terminator.kind) {
    case "jump":
      return [terminator.target];
    case "branch":
      return [terminator.whenTrue, terminator.whenFalse];
    case "return":
    case "unreachable":
      return [];
  }
};

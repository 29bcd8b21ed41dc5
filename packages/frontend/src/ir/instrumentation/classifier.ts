/**
 * Width/opcode classification of arithmetic instructions.
 */

import {
  ArithmeticOperator,
  BINARY_OPERATORS,
  IntKind,
  IrBinaryInstruction,
  IrInstruction,
  intWidth,
  isArithmeticOperator,
  isPointerSizedKind,
  isSignedKind,
} from "../types/index.js";

/** Signed kinds whose arithmetic is instrumented */
export type CheckedIntKind = "Int8" | "Int16" | "Int32";

export const CHECKED_INT_KINDS: readonly CheckedIntKind[] = [
  "Int8",
  "Int16",
  "Int32",
];

export const isCheckedIntKind = (kind: IntKind): kind is CheckedIntKind =>
  isSignedKind(kind) && !isPointerSizedKind(kind) && intWidth(kind) <= 32;

export type Classification =
  | {
      readonly kind: "qualifies";
      readonly operator: ArithmeticOperator;
      readonly intKind: CheckedIntKind;
    }
  | {
      readonly kind: "skip";
      readonly reason:
        | "notArithmetic"
        | "alreadyMarked"
        | "unsigned"
        | "wideOrPointerSized";
    }
  | { readonly kind: "malformed"; readonly reason: string };

const classifyBinary = (inst: IrBinaryInstruction): Classification => {
  // Operator strings come from outside the type system when IR is
  // deserialized or built by hand; re-check them here.
  const operator: string = inst.operator;
  if (!BINARY_OPERATORS.some((known) => known === operator)) {
    return {
      kind: "malformed",
      reason: `unknown binary operator '${operator}'`,
    };
  }
  if (inst.type.kind !== "intType") {
    return {
      kind: "malformed",
      reason: `binary '${operator}' on non-integer type '${inst.type.kind}'`,
    };
  }
  if (!isArithmeticOperator(operator)) {
    return { kind: "skip", reason: "notArithmetic" };
  }
  if (inst.overflow !== undefined) {
    return { kind: "skip", reason: "alreadyMarked" };
  }

  const intKind = inst.type.intKind;
  if (!isSignedKind(intKind)) {
    return { kind: "skip", reason: "unsigned" };
  }
  if (!isCheckedIntKind(intKind)) {
    return { kind: "skip", reason: "wideOrPointerSized" };
  }
  return { kind: "qualifies", operator, intKind };
};

/**
 * Classify any instruction; only `binary` can qualify.
 */
export const classify = (inst: IrInstruction): Classification =>
  inst.kind === "binary"
    ? classifyBinary(inst)
    : { kind: "skip", reason: "notArithmetic" };

/**
 * True iff the instruction is signed 8/16/32-bit add, sub, mul or div
 * that has not been instrumented yet.
 */
export const qualifies = (inst: IrInstruction): boolean =>
  classify(inst).kind === "qualifies";

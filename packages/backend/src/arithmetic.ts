/**
 * Integer semantics of the target: every result is reduced to the
 * operation's width (two's complement for signed kinds, modulo 2^n for
 * unsigned kinds). Nothing here detects overflow.
 */

import {
  BinaryOperator,
  CompareOperator,
  IntKind,
  intWidth,
  wrapToKind,
} from "@intguard/frontend";
import { DIVIDE_BY_ZERO_MESSAGE, panic } from "./fault.js";

const shift = (
  operator: "shl" | "shr",
  kind: IntKind,
  value: bigint,
  count: bigint
): bigint => {
  if (count < 0n) {
    return panic("negative shift amount");
  }
  const width = BigInt(intWidth(kind));
  if (count >= width) {
    // Everything shifted out; right shifts of negatives keep the sign
    return operator === "shr" && value < 0n ? -1n : 0n;
  }
  return operator === "shl"
    ? wrapToKind(value << count, kind)
    : wrapToKind(value >> count, kind);
};

export const evalBinary = (
  operator: BinaryOperator,
  kind: IntKind,
  left: bigint,
  right: bigint
): bigint => {
  switch (operator) {
    case "add":
      return wrapToKind(left + right, kind);
    case "sub":
      return wrapToKind(left - right, kind);
    case "mul":
      return wrapToKind(left * right, kind);
    case "div":
      if (right === 0n) {
        return panic(DIVIDE_BY_ZERO_MESSAGE);
      }
      // bigint division truncates toward zero; MIN / -1 wraps to MIN
      return wrapToKind(left / right, kind);
    case "rem":
      if (right === 0n) {
        return panic(DIVIDE_BY_ZERO_MESSAGE);
      }
      return wrapToKind(left % right, kind);
    case "bitAnd":
      return wrapToKind(left & right, kind);
    case "bitOr":
      return wrapToKind(left | right, kind);
    case "bitXor":
      return wrapToKind(left ^ right, kind);
    case "shl":
    case "shr":
      return shift(operator, kind, left, right);
  }
};

export const evalCompare = (
  operator: CompareOperator,
  left: bigint,
  right: bigint
): boolean => {
  switch (operator) {
    case "eq":
      return left === right;
    case "ne":
      return left !== right;
    case "lt":
      return left < right;
    case "le":
      return left <= right;
    case "gt":
      return left > right;
    case "ge":
      return left >= right;
  }
};

export const evalNegate = (kind: IntKind, value: bigint): bigint =>
  wrapToKind(-value, kind);

export const evalBitNot = (kind: IntKind, value: bigint): bigint =>
  wrapToKind(~value, kind);

/**
 * Sign-extend, zero-extend or truncate. Values of unsigned source kinds
 * are never negative, so reinterpreting the exact value is enough.
 */
export const evalConvert = (value: bigint, to: IntKind): bigint =>
  wrapToKind(value, to);

/**
 * IntKind - the fixed-width integer kinds of the IR.
 *
 * This module provides:
 * - IntKind type union
 * - Mapping from source type names to kinds
 * - Width, signedness and range for each kind
 * - Two's-complement wrapping of exact values
 */

export type IntKind =
  | "Int8" // -128 to 127
  | "Int16"
  | "Int32"
  | "Int64"
  | "UInt8" // 0 to 255
  | "UInt16"
  | "UInt32"
  | "UInt64"
  | "ISize" // pointer-sized signed
  | "USize"; // pointer-sized unsigned

export type IntWidth = 8 | 16 | 32 | 64;

/**
 * Maps source type names to integer kinds.
 */
export const SOURCE_TYPE_TO_INT_KIND: ReadonlyMap<string, IntKind> = new Map([
  ["int8", "Int8"],
  ["int16", "Int16"],
  ["int32", "Int32"],
  ["int64", "Int64"],
  ["uint8", "UInt8"],
  ["uint16", "UInt16"],
  ["uint32", "UInt32"],
  ["uint64", "UInt64"],
  ["isize", "ISize"],
  ["usize", "USize"],
]);

/**
 * Maps integer kinds back to source type names for printing.
 */
export const INT_KIND_TO_SOURCE_TYPE: ReadonlyMap<IntKind, string> = new Map(
  [...SOURCE_TYPE_TO_INT_KIND].map(([name, kind]) => [kind, name])
);

type KindInfo = {
  readonly width: IntWidth;
  readonly signed: boolean;
  readonly pointerSized: boolean;
};

// Pointer-sized kinds are modelled as 64-bit.
const KIND_INFO: Readonly<Record<IntKind, KindInfo>> = {
  Int8: { width: 8, signed: true, pointerSized: false },
  Int16: { width: 16, signed: true, pointerSized: false },
  Int32: { width: 32, signed: true, pointerSized: false },
  Int64: { width: 64, signed: true, pointerSized: false },
  UInt8: { width: 8, signed: false, pointerSized: false },
  UInt16: { width: 16, signed: false, pointerSized: false },
  UInt32: { width: 32, signed: false, pointerSized: false },
  UInt64: { width: 64, signed: false, pointerSized: false },
  ISize: { width: 64, signed: true, pointerSized: true },
  USize: { width: 64, signed: false, pointerSized: true },
};

export const isIntKind = (name: string): name is IntKind =>
  Object.prototype.hasOwnProperty.call(KIND_INFO, name);

export const INT_KINDS: readonly IntKind[] = Object.keys(KIND_INFO).filter(
  isIntKind
);

export const intWidth = (kind: IntKind): IntWidth => KIND_INFO[kind].width;

export const isSignedKind = (kind: IntKind): boolean => KIND_INFO[kind].signed;

export const isPointerSizedKind = (kind: IntKind): boolean =>
  KIND_INFO[kind].pointerSized;

/**
 * Two's-complement range of a kind, exact.
 */
export const intRange = (
  kind: IntKind
): { readonly min: bigint; readonly max: bigint } => {
  const bits = BigInt(intWidth(kind));
  if (isSignedKind(kind)) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
};

export const fitsInKind = (value: bigint, kind: IntKind): boolean => {
  const { min, max } = intRange(kind);
  return value >= min && value <= max;
};

/**
 * Reduce an exact value to the kind's width, as the hardware would.
 */
export const wrapToKind = (value: bigint, kind: IntKind): bigint =>
  isSignedKind(kind)
    ? BigInt.asIntN(intWidth(kind), value)
    : BigInt.asUintN(intWidth(kind), value);

/**
 * The signed kind of twice the width, for the narrow signed kinds.
 */
export const doubledSignedKind = (kind: IntKind): IntKind | undefined => {
  switch (kind) {
    case "Int8":
      return "Int16";
    case "Int16":
      return "Int32";
    case "Int32":
      return "Int64";
    default:
      return undefined;
  }
};

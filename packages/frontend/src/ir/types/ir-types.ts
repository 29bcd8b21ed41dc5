/**
 * Type system types for IR (IrType and its variants)
 */

import type { IntKind } from "./int-kind.js";

export type IrType = IrIntType | IrBoolType | IrStringType | IrVoidType;

export type IrIntType = {
  readonly kind: "intType";
  readonly intKind: IntKind;
};

export type IrBoolType = {
  readonly kind: "boolType";
};

/** Only used for constant messages passed to builtins */
export type IrStringType = {
  readonly kind: "stringType";
};

export type IrVoidType = {
  readonly kind: "voidType";
};

export const intType = (intKind: IntKind): IrIntType => ({
  kind: "intType",
  intKind,
});

export const boolType: IrBoolType = { kind: "boolType" };
export const stringType: IrStringType = { kind: "stringType" };
export const voidType: IrVoidType = { kind: "voidType" };

export const typesEqual = (a: IrType, b: IrType): boolean =>
  a.kind === "intType" && b.kind === "intType"
    ? a.intKind === b.intKind
    : a.kind === b.kind;

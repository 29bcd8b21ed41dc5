/**
 * Type annotation resolution
 *
 * Integer types are written by width (int8 to int64, uint8 to uint64) or
 * as the pointer-sized isize and usize; `boolean` and `void` are the
 * TypeScript keywords.
 */

import * as ts from "typescript";
import {
  IrType,
  SOURCE_TYPE_TO_INT_KIND,
  boolType,
  intType,
  voidType,
} from "../types/index.js";
import { failAt } from "./context.js";

export const DEFAULT_INT_TYPE = intType("Int32");

export const resolveTypeNode = (
  sourceFile: ts.SourceFile,
  node: ts.TypeNode
): IrType => {
  if (node.kind === ts.SyntaxKind.BooleanKeyword) {
    return boolType;
  }
  if (node.kind === ts.SyntaxKind.VoidKeyword) {
    return voidType;
  }
  if (
    ts.isTypeReferenceNode(node) &&
    ts.isIdentifier(node.typeName) &&
    node.typeArguments === undefined
  ) {
    const intKind = SOURCE_TYPE_TO_INT_KIND.get(node.typeName.text);
    if (intKind !== undefined) {
      return intType(intKind);
    }
  }
  return failAt(
    sourceFile,
    node,
    "IG2004",
    `Unknown type '${node.getText(sourceFile)}'`,
    "Use one of int8, int16, int32, int64, uint8, uint16, uint32, uint64, isize, usize, boolean, void."
  );
};

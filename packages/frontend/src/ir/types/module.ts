/**
 * Core IR module types (Module, Function, Block)
 */

import type { SourceLocation } from "../../types/diagnostic.js";
import type { IrType } from "./ir-types.js";
import type {
  BlockId,
  IrInstruction,
  IrTerminator,
  TempId,
} from "./instructions.js";

export type IrModule = {
  readonly kind: "module";
  readonly filePath: string;
  /** Package identity of the compilation unit, e.g. "internal/abi" */
  readonly packagePath: string;
  readonly functions: readonly IrFunction[];
};

export type IrParameter = {
  readonly name: string;
  readonly type: IrType;
  /** Temporary holding the argument on entry */
  readonly temp: TempId;
};

export type IrLocal = {
  readonly name: string;
  readonly type: IrType;
};

export type IrFunction = {
  readonly kind: "function";
  readonly name: string;
  readonly isExported: boolean;
  readonly parameters: readonly IrParameter[];
  readonly returnType: IrType;
  readonly locals: readonly IrLocal[];
  /** First block is the entry block */
  readonly blocks: readonly IrBlock[];
  readonly location?: SourceLocation;
};

export type IrBlock = {
  readonly id: BlockId;
  readonly instructions: readonly IrInstruction[];
  readonly terminator: IrTerminator;
};

export const findFunction = (
  module: IrModule,
  name: string
): IrFunction | undefined => module.functions.find((fn) => fn.name === name);

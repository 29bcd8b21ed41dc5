/**
 * IR module exports
 */

export * from "./types.js";
export {
  buildIr,
  buildIrModule,
  parseIntegerLexeme,
  type IrBuildOptions,
} from "./builder.js";
export {
  printFunction,
  printInstruction,
  printModule,
  printTerminator,
  printType,
} from "./printer.js";
export { type NameSupply, createNameSupply } from "./name-supply.js";
export {
  type IrVerificationResult,
  BUILTIN_FUNCTIONS,
  verifyModule,
  verifyModules,
} from "./validation/index.js";
export * from "./instrumentation/index.js";

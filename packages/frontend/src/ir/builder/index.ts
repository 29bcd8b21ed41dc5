/**
 * IR Builder - Public API
 */

export { buildIrModule, buildIr, type IrBuildOptions } from "./orchestrator.js";
export { parseIntegerLexeme } from "./expressions.js";
export { LoweringError, type FunctionSignature } from "./context.js";

/**
 * intguard backend - executes IR in process
 */

export { runFunction } from "./interpreter.js";

export {
  DIVIDE_BY_ZERO_MESSAGE,
  FaultSignal,
  formatFault,
  formatValue,
} from "./fault.js";

export {
  evalBinary,
  evalBitNot,
  evalCompare,
  evalConvert,
  evalNegate,
} from "./arithmetic.js";

export type {
  FaultKind,
  RunOptions,
  RunOutcome,
  RuntimeFault,
  RuntimeValue,
  TraceFrame,
} from "./types.js";

/**
 * Overflow instrumentation exports
 */

export {
  type ExemptionSet,
  DEFAULT_EXEMPTION_ENTRIES,
  DEFAULT_EXEMPTION_SET,
  createExemptionSet,
  extendExemptionSet,
  isExempt,
  shouldInstrument,
} from "./exemptions.js";

export {
  type CheckedIntKind,
  type Classification,
  CHECKED_INT_KINDS,
  classify,
  isCheckedIntKind,
  qualifies,
} from "./classifier.js";

export {
  type OverflowPredicate,
  type PredicateTerm,
  type MultiplyStrategy,
  type OperandValues,
  type PredicateEvaluation,
  MULTIPLY_STRATEGIES,
  buildPredicate,
  evaluatePredicate,
  formatPredicate,
} from "./overflow-predicate.js";

export {
  type InstrumentedNode,
  OVERFLOW_PANIC_MESSAGE,
  PANIC_BUILTIN,
  guardOperation,
  insertGuard,
  spliceInstrumentedNode,
} from "./guard-inserter.js";

export {
  type OverflowCheckOptions,
  type OverflowCheckResult,
  type ModuleInstrumentationStats,
  runOverflowCheckPass,
} from "./overflow-check-pass.js";

/**
 * Overflow predicates for signed add, sub, mul and div.
 *
 * A predicate is a small boolean tree over the two operand values and
 * constants of the operand range. `all` and `any` are evaluated left to
 * right with short-circuiting, both here and in the lowered IR, so an
 * arithmetic term is only evaluated once the conditions before it hold.
 * Under that order the Add, Sub and Div formulas never leave the operand
 * range; only terms marked `wrapping` may.
 */

import {
  ArithmeticOperator,
  CompareOperator,
  IntKind,
  doubledSignedKind,
  intRange,
  wrapToKind,
} from "../types/index.js";
import type { CheckedIntKind } from "./classifier.js";

export type OperandSide = "left" | "right";

export type PredicateTerm =
  | {
      readonly kind: "operand";
      readonly side: OperandSide;
      readonly type: IntKind;
    }
  | { readonly kind: "constant"; readonly value: bigint; readonly type: IntKind }
  | {
      readonly kind: "arith";
      readonly operator: ArithmeticOperator;
      readonly left: PredicateTerm;
      readonly right: PredicateTerm;
      readonly type: IntKind;
      /** The exact result may leave the range and is wrapped */
      readonly wrapping: boolean;
    }
  | {
      readonly kind: "widen";
      readonly term: PredicateTerm;
      readonly to: IntKind;
    };

export type OverflowPredicate =
  | {
      readonly kind: "compare";
      readonly operator: CompareOperator;
      readonly left: PredicateTerm;
      readonly right: PredicateTerm;
    }
  /** `term < min || term > max`, with the term evaluated once */
  | {
      readonly kind: "outOfRange";
      readonly term: PredicateTerm;
      readonly min: bigint;
      readonly max: bigint;
    }
  | { readonly kind: "all"; readonly conditions: readonly OverflowPredicate[] }
  | { readonly kind: "any"; readonly conditions: readonly OverflowPredicate[] };

export type MultiplyStrategy = "widen" | "backDivide";

export const MULTIPLY_STRATEGIES: readonly MultiplyStrategy[] = [
  "widen",
  "backDivide",
];

export const termType = (term: PredicateTerm): IntKind => {
  switch (term.kind) {
    case "operand":
    case "constant":
    case "arith":
      return term.type;
    case "widen":
      return term.to;
  }
};

// Construction helpers

const operand = (side: OperandSide, type: IntKind): PredicateTerm => ({
  kind: "operand",
  side,
  type,
});

const constant = (value: bigint, type: IntKind): PredicateTerm => ({
  kind: "constant",
  value,
  type,
});

const arith = (
  operator: ArithmeticOperator,
  left: PredicateTerm,
  right: PredicateTerm,
  wrapping = false
): PredicateTerm => ({
  kind: "arith",
  operator,
  left,
  right,
  type: termType(left),
  wrapping,
});

const compare = (
  operator: CompareOperator,
  left: PredicateTerm,
  right: PredicateTerm
): OverflowPredicate => ({ kind: "compare", operator, left, right });

const all = (...conditions: OverflowPredicate[]): OverflowPredicate => ({
  kind: "all",
  conditions,
});

const any = (...conditions: OverflowPredicate[]): OverflowPredicate => ({
  kind: "any",
  conditions,
});

type PredicateBuilder = (
  kind: CheckedIntKind,
  strategy: MultiplyStrategy
) => OverflowPredicate;

const buildAdd: PredicateBuilder = (kind) => {
  const { min, max } = intRange(kind);
  const l = operand("left", kind);
  const r = operand("right", kind);
  const zero = constant(0n, kind);
  return any(
    all(
      compare("ge", r, zero),
      compare("gt", l, arith("sub", constant(max, kind), r))
    ),
    all(
      compare("lt", r, zero),
      compare("lt", l, arith("sub", constant(min, kind), r))
    )
  );
};

// Add of left and -right, without negating right (MIN has no negation).
const buildSub: PredicateBuilder = (kind) => {
  const { min, max } = intRange(kind);
  const l = operand("left", kind);
  const r = operand("right", kind);
  const zero = constant(0n, kind);
  return any(
    all(
      compare("le", r, zero),
      compare("gt", l, arith("add", constant(max, kind), r))
    ),
    all(
      compare("gt", r, zero),
      compare("lt", l, arith("add", constant(min, kind), r))
    )
  );
};

const buildWideMul = (kind: CheckedIntKind): OverflowPredicate => {
  const { min, max } = intRange(kind);
  const wide = doubledSignedKind(kind);
  if (wide === undefined) {
    throw new Error(`No doubled kind for ${kind}`);
  }
  const l = operand("left", kind);
  const r = operand("right", kind);
  const zero = constant(0n, kind);
  const product = arith(
    "mul",
    { kind: "widen", term: l, to: wide },
    { kind: "widen", term: r, to: wide }
  );
  return all(
    compare("ne", l, zero),
    compare("ne", r, zero),
    { kind: "outOfRange", term: product, min, max }
  );
};

// (l*r)/l == r verifies the wrapped product, except where the check
// itself would divide MIN by -1; those two cases are listed first.
const buildBackDivideMul = (kind: CheckedIntKind): OverflowPredicate => {
  const { min } = intRange(kind);
  const l = operand("left", kind);
  const r = operand("right", kind);
  const zero = constant(0n, kind);
  const minusOne = constant(-1n, kind);
  const minimum = constant(min, kind);
  const product = arith("mul", l, r, true);
  return all(
    compare("ne", l, zero),
    compare("ne", r, zero),
    any(
      all(compare("eq", l, minusOne), compare("eq", r, minimum)),
      all(compare("eq", r, minusOne), compare("eq", l, minimum)),
      compare("ne", arith("div", product, l), r)
    )
  );
};

const buildMul: PredicateBuilder = (kind, strategy) =>
  strategy === "widen" ? buildWideMul(kind) : buildBackDivideMul(kind);

// Division by zero is the original operation's own fault.
const buildDiv: PredicateBuilder = (kind) => {
  const { min } = intRange(kind);
  return all(
    compare("eq", operand("right", kind), constant(-1n, kind)),
    compare("eq", operand("left", kind), constant(min, kind))
  );
};

const PREDICATE_BUILDERS: {
  readonly [Op in ArithmeticOperator]: PredicateBuilder;
} = {
  add: buildAdd,
  sub: buildSub,
  mul: buildMul,
  div: buildDiv,
};

/**
 * Build the condition that is true exactly when `left op right`
 * overflows the operand kind.
 */
export const buildPredicate = (
  operator: ArithmeticOperator,
  kind: CheckedIntKind,
  strategy: MultiplyStrategy = "widen"
): OverflowPredicate => PREDICATE_BUILDERS[operator](kind, strategy);

// Evaluation

export type OperandValues = {
  readonly left: bigint;
  readonly right: bigint;
};

export type PredicateEvaluation = {
  readonly overflows: boolean;
  /** A term not marked `wrapping` left its range during evaluation */
  readonly termWrapped: boolean;
};

type EvalState = { termWrapped: boolean };

const exactArith = (
  operator: ArithmeticOperator,
  left: bigint,
  right: bigint
): bigint => {
  switch (operator) {
    case "add":
      return left + right;
    case "sub":
      return left - right;
    case "mul":
      return left * right;
    case "div":
      if (right === 0n) {
        throw new Error("Overflow predicate divided by zero");
      }
      return left / right;
  }
};

const evaluateTerm = (
  term: PredicateTerm,
  values: OperandValues,
  state: EvalState
): bigint => {
  switch (term.kind) {
    case "operand":
      return values[term.side];
    case "constant":
      return term.value;
    case "widen":
      return evaluateTerm(term.term, values, state);
    case "arith": {
      const exact = exactArith(
        term.operator,
        evaluateTerm(term.left, values, state),
        evaluateTerm(term.right, values, state)
      );
      const wrapped = wrapToKind(exact, term.type);
      if (wrapped !== exact && !term.wrapping) {
        state.termWrapped = true;
      }
      return wrapped;
    }
  }
};

const compareValues = (
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

const evaluateCondition = (
  predicate: OverflowPredicate,
  values: OperandValues,
  state: EvalState
): boolean => {
  switch (predicate.kind) {
    case "compare":
      return compareValues(
        predicate.operator,
        evaluateTerm(predicate.left, values, state),
        evaluateTerm(predicate.right, values, state)
      );
    case "outOfRange": {
      const value = evaluateTerm(predicate.term, values, state);
      return value < predicate.min || value > predicate.max;
    }
    case "all":
      return predicate.conditions.every((c) =>
        evaluateCondition(c, values, state)
      );
    case "any":
      return predicate.conditions.some((c) =>
        evaluateCondition(c, values, state)
      );
  }
};

/**
 * Evaluate a predicate on concrete operand values, with the same
 * short-circuit order and wrapping behaviour as the lowered guard.
 */
export const evaluatePredicate = (
  predicate: OverflowPredicate,
  values: OperandValues
): PredicateEvaluation => {
  const state: EvalState = { termWrapped: false };
  const overflows = evaluateCondition(predicate, values, state);
  return { overflows, termWrapped: state.termWrapped };
};

// Formatting

const ARITH_SYMBOLS: Readonly<Record<ArithmeticOperator, string>> = {
  add: "+",
  sub: "-",
  mul: "*",
  div: "/",
};

const COMPARE_SYMBOLS: Readonly<Record<CompareOperator, string>> = {
  eq: "==",
  ne: "!=",
  lt: "<",
  le: "<=",
  gt: ">",
  ge: ">=",
};

export const formatTerm = (term: PredicateTerm): string => {
  switch (term.kind) {
    case "operand":
      return term.side === "left" ? "l" : "r";
    case "constant":
      return term.value.toString();
    case "widen":
      return `${term.to}(${formatTerm(term.term)})`;
    case "arith":
      return `(${formatTerm(term.left)} ${ARITH_SYMBOLS[term.operator]} ${formatTerm(term.right)})`;
  }
};

/**
 * Render a predicate as a one-line expression over `l` and `r`.
 */
export const formatPredicate = (predicate: OverflowPredicate): string => {
  switch (predicate.kind) {
    case "compare":
      return `${formatTerm(predicate.left)} ${COMPARE_SYMBOLS[predicate.operator]} ${formatTerm(predicate.right)}`;
    case "outOfRange":
      return `${formatTerm(predicate.term)} not in [${predicate.min}, ${predicate.max}]`;
    case "all":
      return predicate.conditions
        .map((c) => (c.kind === "any" ? `(${formatPredicate(c)})` : formatPredicate(c)))
        .join(" && ");
    case "any":
      return predicate.conditions
        .map((c) => (c.kind === "all" ? `(${formatPredicate(c)})` : formatPredicate(c)))
        .join(" || ");
  }
};

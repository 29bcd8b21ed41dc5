/**
 * Tests for overflow predicates
 *
 * Predicates are checked against exact arithmetic on every 8-bit and
 * every 16-bit operand pair, and on seeded samples plus boundaries for
 * 32-bit. The 16-bit tables are too large for the bigint evaluator, so
 * each predicate is compiled into a plain-number loop instead.
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ArithmeticOperator,
  CompareOperator,
  fitsInKind,
  intRange,
  intWidth,
  isSignedKind,
} from "../types/index.js";
import type { CheckedIntKind } from "./classifier.js";
import {
  MultiplyStrategy,
  OverflowPredicate,
  PredicateTerm,
  buildPredicate,
  evaluatePredicate,
  formatPredicate,
} from "./overflow-predicate.js";

const exactResult = (
  operator: ArithmeticOperator,
  left: bigint,
  right: bigint
): bigint | undefined => {
  switch (operator) {
    case "add":
      return left + right;
    case "sub":
      return left - right;
    case "mul":
      return left * right;
    case "div":
      // Division by zero faults on its own; it is never an overflow
      return right === 0n ? undefined : left / right;
  }
};

type Mismatch = {
  readonly left: bigint;
  readonly right: bigint;
  readonly expected: boolean;
  readonly actual: boolean;
  readonly termWrapped: boolean;
};

const findMismatches = (
  operator: ArithmeticOperator,
  kind: CheckedIntKind,
  predicate: OverflowPredicate,
  pairs: Iterable<readonly [bigint, bigint]>
): Mismatch[] => {
  const mismatches: Mismatch[] = [];
  for (const [left, right] of pairs) {
    const exact = exactResult(operator, left, right);
    const expected = exact !== undefined && !fitsInKind(exact, kind);
    const { overflows, termWrapped } = evaluatePredicate(predicate, {
      left,
      right,
    });
    if (overflows !== expected || termWrapped) {
      mismatches.push({ left, right, expected, actual: overflows, termWrapped });
      if (mismatches.length >= 10) break;
    }
  }
  return mismatches;
};

function* range(min: bigint, max: bigint): Generator<bigint> {
  for (let v = min; v <= max; v++) {
    yield v;
  }
}

function* cross(
  lefts: () => Iterable<bigint>,
  rights: () => Iterable<bigint>
): Generator<readonly [bigint, bigint]> {
  for (const left of lefts()) {
    for (const right of rights()) {
      yield [left, right];
    }
  }
}

const boundaries = (kind: CheckedIntKind): bigint[] => {
  const { min, max } = intRange(kind);
  return [min, min + 1n, min / 2n, -2n, -1n, 0n, 1n, 2n, max / 2n, max - 1n, max];
};

/** xorshift32, so the sampled operands are the same on every run */
const createRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };
};

const OPERATORS: readonly ArithmeticOperator[] = ["add", "sub", "mul", "div"];

const cases = (): readonly {
  readonly operator: ArithmeticOperator;
  readonly strategy: MultiplyStrategy;
}[] => [
  ...OPERATORS.map((operator) => ({ operator, strategy: "widen" as const })),
  { operator: "mul", strategy: "backDivide" },
];

const COMPARE_SOURCE: Readonly<Record<CompareOperator, string>> = {
  eq: "===",
  ne: "!==",
  lt: "<",
  le: "<=",
  gt: ">",
  ge: ">=",
};

const EXACT_SOURCE: Readonly<Record<ArithmeticOperator, string>> = {
  add: "l + r",
  sub: "l - r",
  mul: "l * r",
  div: "r === 0 ? 0 : Math.trunc(l / r)",
};

type SourceState = { readonly temps: string[] };

const freshTemp = (state: SourceState): string => {
  const name = `t${state.temps.length}`;
  state.temps.push(name);
  return name;
};

/**
 * JavaScript for a term over number operands `l` and `r`. Values stay
 * exact for 8- and 16-bit predicates, whose widest term is a 32-bit
 * product. A non-wrapping term that leaves its range sets `bad`.
 */
const termSource = (state: SourceState, term: PredicateTerm): string => {
  switch (term.kind) {
    case "operand":
      return term.side === "left" ? "l" : "r";
    case "constant":
      return `(${term.value})`;
    case "widen":
      return termSource(state, term.term);
    case "arith": {
      const left = termSource(state, term.left);
      const right = termSource(state, term.right);
      const exact =
        term.operator === "div"
          ? `(${right} === 0 ? (bad = true, 0) : Math.trunc(${left} / ${right}))`
          : `(${left} ${term.operator === "add" ? "+" : term.operator === "sub" ? "-" : "*"} ${right})`;
      if (term.wrapping) {
        if (!isSignedKind(term.type) || intWidth(term.type) > 32) {
          throw new Error(`Cannot wrap ${term.type} in a number`);
        }
        const shift = 32 - intWidth(term.type);
        return `((${exact}) << ${shift} >> ${shift})`;
      }
      const { min, max } = intRange(term.type);
      const temp = freshTemp(state);
      return `(${temp} = ${exact}, ${temp} < ${min} || ${temp} > ${max} ? (bad = true, ${temp}) : ${temp})`;
    }
  }
};

const conditionSource = (
  state: SourceState,
  predicate: OverflowPredicate
): string => {
  switch (predicate.kind) {
    case "compare":
      return `(${termSource(state, predicate.left)} ${COMPARE_SOURCE[predicate.operator]} ${termSource(state, predicate.right)})`;
    case "outOfRange": {
      const temp = freshTemp(state);
      return `(${temp} = ${termSource(state, predicate.term)}, ${temp} < ${predicate.min} || ${temp} > ${predicate.max})`;
    }
    case "all":
      return predicate.conditions.length === 0
        ? "true"
        : `(${predicate.conditions.map((c) => conditionSource(state, c)).join(" && ")})`;
    case "any":
      return predicate.conditions.length === 0
        ? "false"
        : `(${predicate.conditions.map((c) => conditionSource(state, c)).join(" || ")})`;
  }
};

/**
 * Compare a predicate with exact arithmetic on every operand pair of
 * `kind`. Returns the first disagreement, or null.
 */
const checkEveryPair = (
  operator: ArithmeticOperator,
  kind: CheckedIntKind,
  predicate: OverflowPredicate
): unknown => {
  const { min, max } = intRange(kind);
  const state: SourceState = { temps: [] };
  const condition = conditionSource(state, predicate);
  const declarations =
    state.temps.length === 0 ? "" : `let ${state.temps.join(", ")};`;
  const check = new Function(`
    let bad = false;
    ${declarations}
    for (let l = ${min}; l <= ${max}; l++) {
      for (let r = ${min}; r <= ${max}; r++) {
        bad = false;
        const predicted = ${condition};
        const exact = ${EXACT_SOURCE[operator]};
        const expected = exact < ${min} || exact > ${max};
        if (bad || predicted !== expected) {
          return { left: l, right: r, predicted, expected, termWrapped: bad };
        }
      }
    }
    return null;
  `);
  const mismatch: unknown = check();
  return mismatch;
};

describe("Overflow Predicate Builder", () => {
  describe("8-bit, all operand pairs", () => {
    for (const { operator, strategy } of cases()) {
      it(`should match exact arithmetic for ${operator} (${strategy})`, () => {
        const predicate = buildPredicate(operator, "Int8", strategy);
        const pairs = cross(
          () => range(-128n, 127n),
          () => range(-128n, 127n)
        );

        expect(findMismatches(operator, "Int8", predicate, pairs)).to.deep.equal([]);
      });
    }
  });

  describe("16-bit, all operand pairs", () => {
    for (const { operator, strategy } of cases()) {
      it(`should match exact arithmetic for ${operator} (${strategy})`, function () {
        this.timeout(180_000);
        const predicate = buildPredicate(operator, "Int16", strategy);

        expect(checkEveryPair(operator, "Int16", predicate)).to.equal(null);
      });
    }

    it("should report the first pair a wrong predicate gets wrong", () => {
      const divPredicate = buildPredicate("div", "Int16");

      expect(checkEveryPair("add", "Int16", divPredicate)).to.deep.equal({
        left: -32768,
        right: -32768,
        predicted: false,
        expected: true,
        termWrapped: false,
      });
    });
  });

  describe("32-bit, boundaries and seeded samples", () => {
    for (const { operator, strategy } of cases()) {
      it(`should match exact arithmetic for ${operator} (${strategy})`, () => {
        const predicate = buildPredicate(operator, "Int32", strategy);
        const next = createRandom(0x1f2e3d4c);
        const sample = (): bigint => BigInt(next() | 0);
        const samples: (readonly [bigint, bigint])[] = [];
        for (let i = 0; i < 20000; i++) {
          samples.push([sample(), sample()]);
        }
        // Small right operands make the overflow boundary likely
        for (let i = 0; i < 5000; i++) {
          samples.push([sample(), BigInt((next() % 65536) - 32768)]);
        }

        const edges = boundaries("Int32");
        const pairs = [...cross(() => edges, () => edges), ...samples];

        expect(findMismatches(operator, "Int32", predicate, pairs)).to.deep.equal([]);
      });
    }
  });

  describe("edge cases", () => {
    it("should flag MIN / -1 and nothing else for 32-bit div", () => {
      const predicate = buildPredicate("div", "Int32");

      expect(
        evaluatePredicate(predicate, { left: -2147483648n, right: -1n }).overflows
      ).to.equal(true);
      expect(
        evaluatePredicate(predicate, { left: -2147483647n, right: -1n }).overflows
      ).to.equal(false);
    });

    it("should leave division by zero to the operation itself", () => {
      const predicate = buildPredicate("div", "Int8");

      expect(evaluatePredicate(predicate, { left: -128n, right: 0n })).to.deep.equal({
        overflows: false,
        termWrapped: false,
      });
    });

    it("should flag MIN * -1 with both multiply strategies", () => {
      for (const strategy of ["widen", "backDivide"] as const) {
        const predicate = buildPredicate("mul", "Int16", strategy);
        expect(
          evaluatePredicate(predicate, { left: -32768n, right: -1n }).overflows
        ).to.equal(true);
        expect(
          evaluatePredicate(predicate, { left: -1n, right: -32768n }).overflows
        ).to.equal(true);
      }
    });

    it("should not flag multiplication by zero", () => {
      for (const strategy of ["widen", "backDivide"] as const) {
        const predicate = buildPredicate("mul", "Int32", strategy);
        expect(
          evaluatePredicate(predicate, { left: -2147483648n, right: 0n }).overflows
        ).to.equal(false);
      }
    });
  });

  describe("formatPredicate", () => {
    it("should format add", () => {
      expect(formatPredicate(buildPredicate("add", "Int8"))).to.equal(
        "(r >= 0 && l > (127 - r)) || (r < 0 && l < (-128 - r))"
      );
    });

    it("should format sub", () => {
      expect(formatPredicate(buildPredicate("sub", "Int16"))).to.equal(
        "(r <= 0 && l > (32767 + r)) || (r > 0 && l < (-32768 + r))"
      );
    });

    it("should format div", () => {
      expect(formatPredicate(buildPredicate("div", "Int32"))).to.equal(
        "r == -1 && l == -2147483648"
      );
    });

    it("should format widening mul", () => {
      expect(formatPredicate(buildPredicate("mul", "Int8", "widen"))).to.equal(
        "l != 0 && r != 0 && (Int16(l) * Int16(r)) not in [-128, 127]"
      );
    });

    it("should format back-dividing mul", () => {
      expect(formatPredicate(buildPredicate("mul", "Int8", "backDivide"))).to.equal(
        "l != 0 && r != 0 && ((l == -1 && r == -128) || (r == -1 && l == -128) || ((l * r) / l) != r)"
      );
    });
  });
});

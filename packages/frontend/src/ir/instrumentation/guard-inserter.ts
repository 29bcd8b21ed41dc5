/**
 * Guard insertion - wraps one arithmetic instruction in an overflow check.
 *
 * The block holding the operation is split into:
 *
 *   head          instructions before the operation, then the predicate
 *                 lowered to short-circuit branches
 *   check blocks  the rest of the predicate, one block per condition
 *   panic         panic("integer overflow"); unreachable
 *   continuation  the original operation (same dest, same operands),
 *                 the rest of the block and its terminator
 *
 * The head keeps the original block id, so every branch that targeted the
 * block still enters the check first. Operands are the temporaries bound
 * upstream; the check only reads them.
 */

import {
  BlockId,
  CompareOperator,
  IntKind,
  IrBinaryInstruction,
  IrBlock,
  IrFunction,
  IrInstruction,
  IrTerminator,
  TempId,
  intType,
  voidType,
} from "../types/index.js";
import type { NameSupply } from "../name-supply.js";
import {
  OverflowPredicate,
  PredicateTerm,
  termType,
} from "./overflow-predicate.js";

export const OVERFLOW_PANIC_MESSAGE = "integer overflow";
export const PANIC_BUILTIN = "panic";

export type InstrumentedNode = {
  readonly head: IrBlock;
  readonly checks: readonly IrBlock[];
  readonly panic: IrBlock;
  readonly continuation: IrBlock;
};

type OpenBlock = {
  readonly id: BlockId;
  readonly instructions: IrInstruction[];
};

/**
 * Accumulates the blocks of a lowered predicate.
 */
type CheckLowering = {
  readonly operation: IrBinaryInstruction;
  readonly supply: NameSupply;
  readonly closed: IrBlock[];
  current: OpenBlock;
};

const emit = (lowering: CheckLowering, inst: IrInstruction): void => {
  lowering.current.instructions.push(inst);
};

const closeBlock = (
  lowering: CheckLowering,
  terminator: IrTerminator,
  next?: BlockId
): void => {
  lowering.closed.push({
    id: lowering.current.id,
    instructions: lowering.current.instructions,
    terminator,
  });
  if (next !== undefined) {
    lowering.current = { id: next, instructions: [] };
  }
};

const lowerTerm = (lowering: CheckLowering, term: PredicateTerm): TempId => {
  switch (term.kind) {
    case "operand":
      return term.side === "left"
        ? lowering.operation.left
        : lowering.operation.right;

    case "constant": {
      const dest = lowering.supply.temp("ovf");
      emit(lowering, {
        kind: "constInt",
        dest,
        type: intType(term.type),
        value: term.value,
      });
      return dest;
    }

    case "widen": {
      const value = lowerTerm(lowering, term.term);
      const dest = lowering.supply.temp("ovf");
      emit(lowering, {
        kind: "convert",
        dest,
        value,
        from: termType(term.term),
        to: term.to,
      });
      return dest;
    }

    case "arith": {
      const left = lowerTerm(lowering, term.left);
      const right = lowerTerm(lowering, term.right);
      const dest = lowering.supply.temp("ovf");
      emit(lowering, {
        kind: "binary",
        dest,
        operator: term.operator,
        left,
        right,
        type: intType(term.type),
        overflow: "wrapping",
      });
      return dest;
    }
  }
};

const lowerCompare = (
  lowering: CheckLowering,
  operator: CompareOperator,
  left: TempId,
  right: TempId,
  operandKind: IntKind
): TempId => {
  const dest = lowering.supply.temp("ovf");
  emit(lowering, {
    kind: "compare",
    dest,
    operator,
    left,
    right,
    operandType: intType(operandKind),
  });
  return dest;
};

/**
 * Lower a condition as jumping code: control reaches `onTrue` when the
 * condition holds and `onFalse` otherwise. Closes the current block.
 */
const lowerCondition = (
  lowering: CheckLowering,
  predicate: OverflowPredicate,
  onTrue: BlockId,
  onFalse: BlockId
): void => {
  switch (predicate.kind) {
    case "compare": {
      const left = lowerTerm(lowering, predicate.left);
      const right = lowerTerm(lowering, predicate.right);
      const condition = lowerCompare(
        lowering,
        predicate.operator,
        left,
        right,
        termType(predicate.left)
      );
      closeBlock(lowering, {
        kind: "branch",
        condition,
        whenTrue: onTrue,
        whenFalse: onFalse,
      });
      return;
    }

    case "outOfRange": {
      const value = lowerTerm(lowering, predicate.term);
      const kind = termType(predicate.term);
      const min = lowerTerm(lowering, {
        kind: "constant",
        value: predicate.min,
        type: kind,
      });
      const below = lowerCompare(lowering, "lt", value, min, kind);
      const upper = lowering.supply.block("overflow.check");
      closeBlock(
        lowering,
        { kind: "branch", condition: below, whenTrue: onTrue, whenFalse: upper },
        upper
      );
      const max = lowerTerm(lowering, {
        kind: "constant",
        value: predicate.max,
        type: kind,
      });
      const above = lowerCompare(lowering, "gt", value, max, kind);
      closeBlock(lowering, {
        kind: "branch",
        condition: above,
        whenTrue: onTrue,
        whenFalse: onFalse,
      });
      return;
    }

    case "all":
    case "any": {
      const conditions = predicate.conditions;
      if (conditions.length === 0) {
        closeBlock(lowering, {
          kind: "jump",
          target: predicate.kind === "all" ? onTrue : onFalse,
        });
        return;
      }
      conditions.forEach((condition, i) => {
        if (i === conditions.length - 1) {
          lowerCondition(lowering, condition, onTrue, onFalse);
          return;
        }
        const next = lowering.supply.block("overflow.check");
        if (predicate.kind === "all") {
          lowerCondition(lowering, condition, next, onFalse);
        } else {
          lowerCondition(lowering, condition, onTrue, next);
        }
        lowering.current = { id: next, instructions: [] };
      });
      return;
    }
  }
};

const buildPanicBlock = (
  id: BlockId,
  operation: IrBinaryInstruction,
  supply: NameSupply
): IrBlock => {
  const message = supply.temp("ovf");
  return {
    id,
    instructions: [
      { kind: "constString", dest: message, value: OVERFLOW_PANIC_MESSAGE },
      {
        kind: "call",
        callee: PANIC_BUILTIN,
        args: [message],
        type: voidType,
        location: operation.location,
      },
    ],
    terminator: { kind: "unreachable" },
  };
};

/**
 * Guard the binary instruction at `index` of `block` with `predicate`.
 */
export const guardOperation = (
  block: IrBlock,
  index: number,
  predicate: OverflowPredicate,
  supply: NameSupply
): InstrumentedNode => {
  const operation = block.instructions[index];
  if (operation === undefined || operation.kind !== "binary") {
    throw new Error(
      `Block ${block.id} has no binary instruction at index ${index}`
    );
  }

  const panicId = supply.block("overflow.panic");
  const continuationId = supply.block("overflow.cont");

  const lowering: CheckLowering = {
    operation,
    supply,
    closed: [],
    current: { id: block.id, instructions: block.instructions.slice(0, index) },
  };
  lowerCondition(lowering, predicate, panicId, continuationId);

  const [head, ...checks] = lowering.closed;
  if (head === undefined) {
    throw new Error(`Lowering the check for ${operation.dest} produced no blocks`);
  }

  return {
    head,
    checks,
    panic: buildPanicBlock(panicId, operation, supply),
    continuation: {
      id: continuationId,
      instructions: [
        { ...operation, overflow: "guarded" },
        ...block.instructions.slice(index + 1),
      ],
      terminator: block.terminator,
    },
  };
};

/**
 * Replace the block `node.head.id` of `fn` with the blocks of `node`.
 */
export const spliceInstrumentedNode = (
  fn: IrFunction,
  node: InstrumentedNode
): IrFunction => ({
  ...fn,
  blocks: fn.blocks.flatMap((block) =>
    block.id === node.head.id
      ? [node.head, ...node.checks, node.panic, node.continuation]
      : [block]
  ),
});

/**
 * Guard the instruction at `index` of block `blockId` in `fn`.
 * Returns the new function and the id of the continuation block.
 */
export const insertGuard = (
  fn: IrFunction,
  blockId: BlockId,
  index: number,
  predicate: OverflowPredicate,
  supply: NameSupply
): { readonly fn: IrFunction; readonly continuation: BlockId } => {
  const block = fn.blocks.find((b) => b.id === blockId);
  if (block === undefined) {
    throw new Error(`Function ${fn.name} has no block ${blockId}`);
  }
  const node = guardOperation(block, index, predicate, supply);
  return {
    fn: spliceInstrumentedNode(fn, node),
    continuation: node.continuation.id,
  };
};

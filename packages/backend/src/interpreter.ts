/**
 * IR interpreter
 *
 * Executes IR the way the compiled program would run: arithmetic wraps,
 * division by zero faults, `panic` stops the program. Used to run
 * instrumented code without a native toolchain.
 */

import {
  IrBlock,
  IrFunction,
  IrInstruction,
  IrModule,
  IrTerminator,
  Result,
  SourceLocation,
  TempId,
  error,
  findFunction,
  fitsInKind,
  ok,
  printType,
} from "@intguard/frontend";
import {
  evalBinary,
  evalBitNot,
  evalCompare,
  evalConvert,
  evalNegate,
} from "./arithmetic.js";
import { FaultSignal, panic, runtimeError } from "./fault.js";
import type {
  RunOptions,
  RunOutcome,
  RuntimeFault,
  RuntimeValue,
  TraceFrame,
} from "./types.js";

const DEFAULT_MAX_STEPS = 1_000_000;
const DEFAULT_MAX_DEPTH = 1_000;

type Frame = {
  readonly function: string;
  /** Location of the instruction being executed, if it has one */
  location: SourceLocation | undefined;
};

type ExecutionState = {
  readonly module: IrModule;
  readonly maxSteps: number;
  readonly maxDepth: number;
  readonly frames: Frame[];
  steps: number;
};

type FrameValues = {
  readonly temps: Map<TempId, RuntimeValue>;
  readonly locals: Map<string, RuntimeValue>;
};

const read = (values: FrameValues, temp: TempId): RuntimeValue => {
  const value = values.temps.get(temp);
  if (value === undefined) {
    return runtimeError(`read of undefined temporary %${temp}`);
  }
  return value;
};

const readInt = (values: FrameValues, temp: TempId): bigint => {
  const value = read(values, temp);
  if (typeof value !== "bigint") {
    return runtimeError(`%${temp} is not an integer`);
  }
  return value;
};

const readBool = (values: FrameValues, temp: TempId): boolean => {
  const value = read(values, temp);
  if (typeof value !== "boolean") {
    return runtimeError(`%${temp} is not a boolean`);
  }
  return value;
};

const readString = (values: FrameValues, temp: TempId): string => {
  const value = read(values, temp);
  if (typeof value !== "string") {
    return runtimeError(`%${temp} is not a string`);
  }
  return value;
};

const executeInstruction = (
  state: ExecutionState,
  frame: Frame,
  values: FrameValues,
  inst: IrInstruction
): void => {
  state.steps++;
  if (state.steps > state.maxSteps) {
    runtimeError(`step limit of ${state.maxSteps} exceeded`);
  }

  switch (inst.kind) {
    case "constInt":
      values.temps.set(inst.dest, inst.value);
      return;

    case "constBool":
    case "constString":
      values.temps.set(inst.dest, inst.value);
      return;

    case "load": {
      const value = values.locals.get(inst.local);
      if (value === undefined) {
        runtimeError(`read of unassigned local '${inst.local}'`);
        return;
      }
      values.temps.set(inst.dest, value);
      return;
    }

    case "store":
      values.locals.set(inst.local, read(values, inst.value));
      return;

    case "binary": {
      frame.location = inst.location ?? frame.location;
      const type = inst.type;
      if (type.kind !== "intType") {
        runtimeError(`${inst.operator} on ${printType(type)}`);
        return;
      }
      values.temps.set(
        inst.dest,
        evalBinary(
          inst.operator,
          type.intKind,
          readInt(values, inst.left),
          readInt(values, inst.right)
        )
      );
      return;
    }

    case "compare": {
      const left = read(values, inst.left);
      const right = read(values, inst.right);
      if (typeof left === "bigint" && typeof right === "bigint") {
        values.temps.set(inst.dest, evalCompare(inst.operator, left, right));
        return;
      }
      if (
        typeof left === "boolean" &&
        typeof right === "boolean" &&
        (inst.operator === "eq" || inst.operator === "ne")
      ) {
        values.temps.set(
          inst.dest,
          inst.operator === "eq" ? left === right : left !== right
        );
        return;
      }
      runtimeError(`cmp.${inst.operator} on mismatched operands`);
      return;
    }

    case "unary": {
      if (inst.operator === "not") {
        values.temps.set(inst.dest, !readBool(values, inst.operand));
        return;
      }
      const type = inst.type;
      if (type.kind !== "intType") {
        runtimeError(`${inst.operator} on ${printType(type)}`);
        return;
      }
      const operand = readInt(values, inst.operand);
      values.temps.set(
        inst.dest,
        inst.operator === "neg"
          ? evalNegate(type.intKind, operand)
          : evalBitNot(type.intKind, operand)
      );
      return;
    }

    case "convert":
      values.temps.set(
        inst.dest,
        evalConvert(readInt(values, inst.value), inst.to)
      );
      return;

    case "call": {
      frame.location = inst.location ?? frame.location;
      if (inst.callee === "panic") {
        const [message] = inst.args;
        panic(message === undefined ? "panic" : readString(values, message));
        return;
      }
      const callee = findFunction(state.module, inst.callee);
      if (callee === undefined) {
        runtimeError(`call to unknown function '${inst.callee}'`);
        return;
      }
      const result = executeFunction(
        state,
        callee,
        inst.args.map((arg) => read(values, arg))
      );
      if (inst.dest !== undefined) {
        if (result === undefined) {
          runtimeError(`'${inst.callee}' returned no value`);
          return;
        }
        values.temps.set(inst.dest, result);
      }
      return;
    }
  }
};

type Transfer =
  | { readonly kind: "goto"; readonly target: string }
  | { readonly kind: "return"; readonly value: RuntimeValue | undefined };

const executeTerminator = (
  values: FrameValues,
  terminator: IrTerminator
): Transfer => {
  switch (terminator.kind) {
    case "return":
      return {
        kind: "return",
        value:
          terminator.value === undefined
            ? undefined
            : read(values, terminator.value),
      };
    case "jump":
      return { kind: "goto", target: terminator.target };
    case "branch":
      return {
        kind: "goto",
        target: readBool(values, terminator.condition)
          ? terminator.whenTrue
          : terminator.whenFalse,
      };
    case "unreachable":
      return runtimeError("reached unreachable code");
  }
};

const executeFunction = (
  state: ExecutionState,
  fn: IrFunction,
  args: readonly RuntimeValue[]
): RuntimeValue | undefined => {
  if (state.frames.length >= state.maxDepth) {
    runtimeError(`call depth of ${state.maxDepth} exceeded`);
  }
  if (args.length !== fn.parameters.length) {
    runtimeError(
      `${fn.name} expects ${fn.parameters.length} arguments, got ${args.length}`
    );
  }

  const frame: Frame = { function: fn.name, location: fn.location };
  state.frames.push(frame);

  const values: FrameValues = { temps: new Map(), locals: new Map() };
  fn.parameters.forEach((param, i) => {
    const arg = args[i];
    if (arg !== undefined) {
      values.temps.set(param.temp, arg);
    }
  });

  const blocks = new Map<string, IrBlock>(fn.blocks.map((b) => [b.id, b]));
  let block = fn.blocks[0];

  while (block !== undefined) {
    for (const inst of block.instructions) {
      executeInstruction(state, frame, values, inst);
    }
    const transfer = executeTerminator(values, block.terminator);
    if (transfer.kind === "return") {
      state.frames.pop();
      return transfer.value;
    }
    const next = blocks.get(transfer.target);
    if (next === undefined) {
      return runtimeError(`branch to unknown block ${transfer.target}`);
    }
    block = next;
  }

  return runtimeError(`function ${fn.name} has no blocks`);
};

const checkArguments = (
  fn: IrFunction,
  args: readonly RuntimeValue[]
): string | undefined => {
  if (args.length !== fn.parameters.length) {
    return `${fn.name} expects ${fn.parameters.length} arguments, got ${args.length}`;
  }
  for (const [i, param] of fn.parameters.entries()) {
    const arg = args[i];
    const type = param.type;
    if (type.kind === "intType") {
      if (typeof arg !== "bigint" || !fitsInKind(arg, type.intKind)) {
        return `argument ${param.name} must be of type ${printType(type)}, got ${String(arg)}`;
      }
    } else if (type.kind === "boolType" && typeof arg !== "boolean") {
      return `argument ${param.name} must be of type boolean, got ${String(arg)}`;
    }
  }
  return undefined;
};

const snapshotTrace = (frames: readonly Frame[]): readonly TraceFrame[] =>
  [...frames].reverse().map((frame) => ({
    function: frame.function,
    location: frame.location,
  }));

/**
 * Run a function of a module to completion.
 */
export const runFunction = (
  module: IrModule,
  name: string,
  args: readonly RuntimeValue[],
  options: RunOptions = {}
): Result<RunOutcome, RuntimeFault> => {
  const fn = findFunction(module, name);
  if (fn === undefined) {
    return error({
      kind: "runtime",
      message: `no function named '${name}'`,
      trace: [],
    });
  }
  const argumentProblem = checkArguments(fn, args);
  if (argumentProblem !== undefined) {
    return error({ kind: "runtime", message: argumentProblem, trace: [] });
  }

  const state: ExecutionState = {
    module,
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    frames: [],
    steps: 0,
  };

  try {
    const value = executeFunction(state, fn, args);
    return ok({ value, steps: state.steps });
  } catch (err) {
    if (err instanceof FaultSignal) {
      return error({
        kind: err.kind,
        message: err.message,
        trace: snapshotTrace(state.frames),
      });
    }
    throw err;
  }
};

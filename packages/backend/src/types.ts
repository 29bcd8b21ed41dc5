/**
 * Type definitions for IR execution
 */

import type { SourceLocation } from "@intguard/frontend";

/**
 * Integers are exact bigints already reduced to their kind's width.
 * Strings only occur as constant messages for builtins.
 */
export type RuntimeValue = bigint | boolean | string;

/**
 * Fault taxonomy
 * - "panic": the program stopped itself (overflow guard, explicit panic,
 *   division by zero)
 * - "runtime": the interpreter could not continue (step limit, malformed IR)
 */
export type FaultKind = "panic" | "runtime";

export type TraceFrame = {
  readonly function: string;
  readonly location?: SourceLocation;
};

export type RuntimeFault = {
  readonly kind: FaultKind;
  readonly message: string;
  /** Active frames, innermost first */
  readonly trace: readonly TraceFrame[];
};

export type RunOptions = {
  /** Instructions executed before giving up (default 1_000_000) */
  readonly maxSteps?: number;
  /** Nested calls before giving up (default 1_000) */
  readonly maxDepth?: number;
};

export type RunOutcome = {
  /** Undefined for void functions */
  readonly value: RuntimeValue | undefined;
  readonly steps: number;
};

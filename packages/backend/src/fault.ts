/**
 * Faults raised while executing IR
 */

import { formatLocation } from "@intguard/frontend";
import type { FaultKind, RuntimeFault, RuntimeValue } from "./types.js";

/** Message of the divide-by-zero fault raised by `div` and `rem` */
export const DIVIDE_BY_ZERO_MESSAGE = "integer divide by zero";

/**
 * Thrown inside the interpreter and caught at its boundary, where the
 * active frames are attached.
 */
export class FaultSignal extends Error {
  readonly kind: FaultKind;

  constructor(kind: FaultKind, message: string) {
    super(message);
    this.name = "FaultSignal";
    this.kind = kind;
  }
}

export const panic = (message: string): never => {
  throw new FaultSignal("panic", message);
};

export const runtimeError = (message: string): never => {
  throw new FaultSignal("runtime", message);
};

/**
 * Render a fault the way a runtime reports an uncaught panic:
 *
 *   panic: integer overflow
 *       at add8 (main.ts:2:10)
 *       at main (main.ts:6:10)
 */
export const formatFault = (fault: RuntimeFault): string => {
  const head =
    fault.kind === "panic"
      ? `panic: ${fault.message}`
      : `runtime error: ${fault.message}`;
  const frames = fault.trace.map((frame) =>
    frame.location === undefined
      ? `    at ${frame.function}`
      : `    at ${frame.function} (${formatLocation(frame.location)})`
  );
  return [head, ...frames].join("\n");
};

export const formatValue = (value: RuntimeValue | undefined): string =>
  value === undefined
    ? "void"
    : typeof value === "string"
      ? JSON.stringify(value)
      : String(value);

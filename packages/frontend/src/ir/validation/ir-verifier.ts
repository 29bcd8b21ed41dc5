/**
 * IR Verifier - structural checks on lowered or instrumented IR
 *
 * Asserts, per function:
 * - at least one block, block ids unique, branch targets exist
 * - every temporary is defined exactly once and defined before use
 *   somewhere in the function
 * - loads and stores name declared locals
 * - binary instructions use a known operator on an integer type
 * - calls name a function of the module or a builtin
 *
 * Any finding is an internal compiler error (IG6001): the front end
 * and the passes must never produce such IR.
 */

import { Diagnostic, createDiagnostic } from "../../types/diagnostic.js";
import {
  BINARY_OPERATORS,
  IrFunction,
  IrModule,
  definedTemp,
  terminatorTargets,
  usedTemps,
} from "../types/index.js";

export type IrVerificationResult = {
  readonly ok: boolean;
  readonly diagnostics: readonly Diagnostic[];
};

/** Callees provided by the runtime rather than the module */
export const BUILTIN_FUNCTIONS: ReadonlySet<string> = new Set(["panic"]);

const verifyFunction = (
  module: IrModule,
  fn: IrFunction,
  report: (message: string) => void
): void => {
  if (fn.blocks.length === 0) {
    report(`function ${fn.name} has no blocks`);
    return;
  }

  const blockIds = new Set<string>();
  for (const block of fn.blocks) {
    if (blockIds.has(block.id)) {
      report(`function ${fn.name} defines block ${block.id} twice`);
    }
    blockIds.add(block.id);
  }

  const defined = new Set<string>();
  const define = (temp: string): void => {
    if (defined.has(temp)) {
      report(`function ${fn.name} defines %${temp} twice`);
    }
    defined.add(temp);
  };
  fn.parameters.forEach((p) => define(p.temp));
  for (const block of fn.blocks) {
    for (const inst of block.instructions) {
      const dest = definedTemp(inst);
      if (dest !== undefined) {
        define(dest);
      }
    }
  }

  const locals = new Set(fn.locals.map((l) => l.name));
  const functions = new Set(module.functions.map((f) => f.name));

  for (const block of fn.blocks) {
    const where = `${fn.name}/${block.id}`;
    for (const inst of block.instructions) {
      for (const temp of usedTemps(inst)) {
        if (!defined.has(temp)) {
          report(`${where}: %${temp} is used but never defined`);
        }
      }
      if ((inst.kind === "load" || inst.kind === "store") && !locals.has(inst.local)) {
        report(`${where}: unknown local '${inst.local}'`);
      }
      if (inst.kind === "binary") {
        const operator: string = inst.operator;
        if (!BINARY_OPERATORS.some((known) => known === operator)) {
          report(`${where}: unknown binary operator '${operator}'`);
        }
        if (inst.type.kind !== "intType") {
          report(`${where}: binary '${operator}' on ${inst.type.kind}`);
        }
      }
      if (
        inst.kind === "call" &&
        !functions.has(inst.callee) &&
        !BUILTIN_FUNCTIONS.has(inst.callee)
      ) {
        report(`${where}: call to unknown function '${inst.callee}'`);
      }
    }

    const terminator = block.terminator;
    if (terminator.kind === "branch" && !defined.has(terminator.condition)) {
      report(`${where}: %${terminator.condition} is used but never defined`);
    }
    if (
      terminator.kind === "return" &&
      terminator.value !== undefined &&
      !defined.has(terminator.value)
    ) {
      report(`${where}: %${terminator.value} is used but never defined`);
    }
    for (const target of terminatorTargets(terminator)) {
      if (!blockIds.has(target)) {
        report(`${where}: branch to unknown block ${target}`);
      }
    }
  }
};

export const verifyModule = (module: IrModule): IrVerificationResult => {
  const diagnostics: Diagnostic[] = [];
  for (const fn of module.functions) {
    verifyFunction(module, fn, (message) =>
      diagnostics.push(
        createDiagnostic(
          "IG6001",
          "error",
          `Internal compiler error: ${message}`,
          fn.location ?? {
            file: module.filePath,
            line: 1,
            column: 1,
            length: 1,
          }
        )
      )
    );
  }
  return { ok: diagnostics.length === 0, diagnostics };
};

export const verifyModules = (
  modules: readonly IrModule[]
): IrVerificationResult => {
  const diagnostics = modules.flatMap((m) => verifyModule(m).diagnostics);
  return { ok: diagnostics.length === 0, diagnostics };
};

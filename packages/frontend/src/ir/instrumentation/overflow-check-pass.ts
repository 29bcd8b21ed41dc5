/**
 * Overflow Check Pass - guards signed 8/16/32-bit add, sub, mul and div.
 *
 * Runs after lowering and before any backend consumes the IR. For each
 * module the exemption filter is evaluated once; in an instrumented module
 * every instruction of every original block is visited exactly once and
 * each qualifying operation is replaced by an instrumented node.
 *
 * Instructions added by this pass, and operations it has already guarded,
 * carry an overflow marker, so running the pass again changes nothing.
 *
 * A malformed arithmetic instruction is an internal compiler error: the
 * pass reports it and returns ok: false.
 */

import { Diagnostic, createDiagnostic } from "../../types/diagnostic.js";
import type { IrFunction, IrModule } from "../types/index.js";
import { createNameSupply } from "../name-supply.js";
import { classify } from "./classifier.js";
import {
  DEFAULT_EXEMPTION_SET,
  ExemptionSet,
  shouldInstrument,
} from "./exemptions.js";
import { insertGuard } from "./guard-inserter.js";
import { MultiplyStrategy, buildPredicate } from "./overflow-predicate.js";

export type OverflowCheckOptions = {
  /** Defaults to the process-wide exemption set */
  readonly exemptions?: ExemptionSet;
  /** How multiplication is checked; defaults to "widen" */
  readonly multiply?: MultiplyStrategy;
};

export type ModuleInstrumentationStats = {
  readonly filePath: string;
  readonly packagePath: string;
  readonly exempt: boolean;
  /** Operations replaced by an instrumented node */
  readonly instrumented: number;
  /** Instructions visited and left as they were */
  readonly unchanged: number;
};

export type OverflowCheckResult = {
  readonly ok: boolean;
  readonly modules: readonly IrModule[];
  readonly diagnostics: readonly Diagnostic[];
  readonly stats: readonly ModuleInstrumentationStats[];
};

type PassContext = {
  readonly module: IrModule;
  readonly multiply: MultiplyStrategy;
  readonly diagnostics: Diagnostic[];
  instrumented: number;
  unchanged: number;
};

const internalError = (
  ctx: PassContext,
  fn: IrFunction,
  blockId: string,
  reason: string
): Diagnostic =>
  createDiagnostic(
    "IG6001",
    "error",
    `Internal compiler error: malformed arithmetic in ${fn.name} (block ${blockId}): ${reason}`,
    fn.location ?? {
      file: ctx.module.filePath,
      line: 1,
      column: 1,
      length: 1,
    },
    "The IR reaching the overflow pass is not well formed. Report this issue with the source that triggered it."
  );

const processFunction = (fn: IrFunction, ctx: PassContext): IrFunction => {
  const supply = createNameSupply(fn);
  let current = fn;

  for (const original of fn.blocks) {
    let blockId = original.id;
    let index = 0;
    let block = original;

    while (index < block.instructions.length) {
      const inst = block.instructions[index];
      if (inst === undefined) {
        break;
      }
      const classification = classify(inst);

      if (classification.kind === "malformed") {
        ctx.diagnostics.push(
          internalError(ctx, fn, blockId, classification.reason)
        );
        ctx.unchanged++;
        index++;
        continue;
      }

      if (classification.kind === "skip") {
        ctx.unchanged++;
        index++;
        continue;
      }

      const predicate = buildPredicate(
        classification.operator,
        classification.intKind,
        ctx.multiply
      );
      const guarded = insertGuard(current, blockId, index, predicate, supply);
      current = guarded.fn;
      ctx.instrumented++;

      // The rest of the original block now follows the guarded
      // operation at the start of the continuation block.
      blockId = guarded.continuation;
      const continuation = current.blocks.find((b) => b.id === blockId);
      if (continuation === undefined) {
        throw new Error(`Continuation block ${blockId} was not spliced`);
      }
      block = continuation;
      index = 1;
    }
  }

  return current;
};

const countInstructions = (module: IrModule): number =>
  module.functions.reduce(
    (total, fn) =>
      total +
      fn.blocks.reduce((sum, block) => sum + block.instructions.length, 0),
    0
  );

const processModule = (
  module: IrModule,
  exemptions: ExemptionSet,
  multiply: MultiplyStrategy
): {
  readonly module: IrModule;
  readonly diagnostics: readonly Diagnostic[];
  readonly stats: ModuleInstrumentationStats;
} => {
  // Evaluated once per compilation unit; no per-node override.
  if (!shouldInstrument(module.packagePath, exemptions)) {
    return {
      module,
      diagnostics: [],
      stats: {
        filePath: module.filePath,
        packagePath: module.packagePath,
        exempt: true,
        instrumented: 0,
        unchanged: countInstructions(module),
      },
    };
  }

  const ctx: PassContext = {
    module,
    multiply,
    diagnostics: [],
    instrumented: 0,
    unchanged: 0,
  };
  const functions = module.functions.map((fn) => processFunction(fn, ctx));

  return {
    module: { ...module, functions },
    diagnostics: ctx.diagnostics,
    stats: {
      filePath: module.filePath,
      packagePath: module.packagePath,
      exempt: false,
      instrumented: ctx.instrumented,
      unchanged: ctx.unchanged,
    },
  };
};

/**
 * Run the overflow check pass on all modules.
 */
export const runOverflowCheckPass = (
  modules: readonly IrModule[],
  options: OverflowCheckOptions = {}
): OverflowCheckResult => {
  const exemptions = options.exemptions ?? DEFAULT_EXEMPTION_SET;
  const multiply = options.multiply ?? "widen";

  const processedModules: IrModule[] = [];
  const allDiagnostics: Diagnostic[] = [];
  const allStats: ModuleInstrumentationStats[] = [];

  for (const module of modules) {
    const result = processModule(module, exemptions, multiply);
    processedModules.push(result.module);
    allDiagnostics.push(...result.diagnostics);
    allStats.push(result.stats);
  }

  return {
    ok: allDiagnostics.length === 0,
    modules: processedModules,
    diagnostics: allDiagnostics,
    stats: allStats,
  };
};

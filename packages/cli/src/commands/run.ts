/**
 * intguard run command - compile and execute in process
 */

import {
  type IrFunction,
  type Result,
  error,
  findFunction,
  fitsInKind,
  ok,
  parseIntegerLexeme,
  printType,
} from "@intguard/frontend";
import {
  type RuntimeValue,
  formatFault,
  formatValue,
  runFunction,
} from "@intguard/backend";
import type { ResolvedConfig } from "../types.js";
import { EXIT_ERROR, EXIT_OK, EXIT_PANIC } from "../cli/constants.js";
import { compileProgram } from "./compile.js";

const parseInteger = (text: string): bigint | undefined => {
  const negative = text.startsWith("-");
  const magnitude = parseIntegerLexeme(negative ? text.slice(1) : text);
  if (magnitude === undefined) return undefined;
  return negative ? -magnitude : magnitude;
};

/**
 * Convert command line arguments to values of the entry function's
 * parameter types
 */
export const parseProgramArgs = (
  fn: IrFunction,
  programArgs: readonly string[]
): Result<readonly RuntimeValue[], string> => {
  if (programArgs.length !== fn.parameters.length) {
    return error(
      `${fn.name} takes ${fn.parameters.length} arguments, got ${programArgs.length}`
    );
  }

  const values: RuntimeValue[] = [];
  for (const [i, param] of fn.parameters.entries()) {
    const text = programArgs[i] ?? "";
    const type = param.type;
    if (type.kind === "boolType") {
      if (text !== "true" && text !== "false") {
        return error(`Argument ${param.name} must be true or false, got '${text}'`);
      }
      values.push(text === "true");
      continue;
    }
    if (type.kind !== "intType") {
      return error(`Parameter ${param.name} has unsupported type ${printType(type)}`);
    }
    const value = parseInteger(text);
    if (value === undefined || !fitsInKind(value, type.intKind)) {
      return error(
        `Argument ${param.name} must be of type ${printType(type)}, got '${text}'`
      );
    }
    values.push(value);
  }
  return ok(values);
};

/**
 * Compile and run the entry function
 */
export const runCommand = (
  config: ResolvedConfig,
  programArgs: string[] = []
): Result<{ exitCode: number }, string> => {
  const compiled = compileProgram(config);
  if (!compiled.ok) {
    return compiled;
  }

  const module = compiled.value.modules.find(
    (m) => findFunction(m, config.entry) !== undefined
  );
  const fn = module === undefined ? undefined : findFunction(module, config.entry);
  if (module === undefined || fn === undefined) {
    return error(`No function named '${config.entry}'`);
  }

  const args = parseProgramArgs(fn, programArgs);
  if (!args.ok) {
    return args;
  }

  if (config.verbose) {
    console.log(`Running ${fn.name}(${programArgs.join(", ")})`);
  }

  const result = runFunction(module, fn.name, args.value);
  if (!result.ok) {
    console.error(formatFault(result.error));
    return ok({
      exitCode: result.error.kind === "panic" ? EXIT_PANIC : EXIT_ERROR,
    });
  }

  if (result.value.value !== undefined && !config.quiet) {
    console.log(formatValue(result.value.value));
  }
  if (config.verbose) {
    console.log(`  ${result.value.steps} instructions executed`);
  }
  return ok({ exitCode: EXIT_OK });
};

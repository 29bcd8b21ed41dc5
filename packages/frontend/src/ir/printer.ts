/**
 * IR text printer - human-readable output for `intguard emit` and tests.
 *
 *   module "main" (main.ts)
 *
 *   export fn add(%a: int8, %b: int8): int8 {
 *     local x: int8
 *   entry:
 *     %t0 = add.guarded int8 %a, %b
 *     ret %t0
 *   }
 */

import {
  INT_KIND_TO_SOURCE_TYPE,
  IrBlock,
  IrFunction,
  IrInstruction,
  IrModule,
  IrTerminator,
  IrType,
} from "./types/index.js";

export const printType = (type: IrType): string => {
  switch (type.kind) {
    case "intType":
      return INT_KIND_TO_SOURCE_TYPE.get(type.intKind) ?? type.intKind;
    case "boolType":
      return "boolean";
    case "stringType":
      return "string";
    case "voidType":
      return "void";
  }
};

const t = (temp: string): string => `%${temp}`;

export const printInstruction = (inst: IrInstruction): string => {
  switch (inst.kind) {
    case "constInt":
      return `${t(inst.dest)} = const ${printType(inst.type)} ${inst.value}`;
    case "constBool":
      return `${t(inst.dest)} = const boolean ${inst.value}`;
    case "constString":
      return `${t(inst.dest)} = const string ${JSON.stringify(inst.value)}`;
    case "load":
      return `${t(inst.dest)} = load ${printType(inst.type)} ${inst.local}`;
    case "store":
      return `store ${inst.local}, ${t(inst.value)}`;
    case "binary": {
      const op =
        inst.overflow === undefined
          ? inst.operator
          : `${inst.operator}.${inst.overflow}`;
      return `${t(inst.dest)} = ${op} ${printType(inst.type)} ${t(inst.left)}, ${t(inst.right)}`;
    }
    case "compare":
      return `${t(inst.dest)} = cmp.${inst.operator} ${printType(inst.operandType)} ${t(inst.left)}, ${t(inst.right)}`;
    case "unary":
      return `${t(inst.dest)} = ${inst.operator} ${printType(inst.type)} ${t(inst.operand)}`;
    case "convert":
      return `${t(inst.dest)} = convert ${printType({ kind: "intType", intKind: inst.from })} ${t(inst.value)} to ${printType({ kind: "intType", intKind: inst.to })}`;
    case "call": {
      const call = `call ${inst.callee}(${inst.args.map(t).join(", ")})`;
      return inst.dest === undefined
        ? call
        : `${t(inst.dest)} = ${call}: ${printType(inst.type)}`;
    }
  }
};

export const printTerminator = (terminator: IrTerminator): string => {
  switch (terminator.kind) {
    case "return":
      return terminator.value === undefined
        ? "ret void"
        : `ret ${t(terminator.value)}`;
    case "jump":
      return `jump ${terminator.target}`;
    case "branch":
      return `br ${t(terminator.condition)}, ${terminator.whenTrue}, ${terminator.whenFalse}`;
    case "unreachable":
      return "unreachable";
  }
};

const printBlock = (block: IrBlock): string[] => [
  `${block.id}:`,
  ...block.instructions.map((inst) => `  ${printInstruction(inst)}`),
  `  ${printTerminator(block.terminator)}`,
];

export const printFunction = (fn: IrFunction): string => {
  const params = fn.parameters
    .map((p) => `${t(p.temp)}: ${printType(p.type)}`)
    .join(", ");
  const header = `${fn.isExported ? "export " : ""}fn ${fn.name}(${params}): ${printType(fn.returnType)} {`;
  return [
    header,
    ...fn.locals.map((local) => `  local ${local.name}: ${printType(local.type)}`),
    ...fn.blocks.flatMap(printBlock),
    "}",
  ].join("\n");
};

export const printModule = (module: IrModule): string => {
  const lines = [`module ${JSON.stringify(module.packagePath)} (${module.filePath})`];
  for (const fn of module.functions) {
    lines.push("");
    lines.push(printFunction(fn));
  }
  return `${lines.join("\n")}\n`;
};

/**
 * Tests for the overflow check pass driver
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { compileSource } from "../../index.js";
import type { IrModule } from "../types/index.js";
import { boolType, intType } from "../types/index.js";
import { printModule } from "../printer.js";
import { verifyModules } from "../validation/ir-verifier.js";
import { createExemptionSet } from "./exemptions.js";
import { runOverflowCheckPass } from "./overflow-check-pass.js";

const compile = (source: string, packagePath?: string): IrModule => {
  const result = compileSource(source, { packagePath });
  if (!result.ok) {
    throw new Error(result.error.map((d) => d.message).join("\n"));
  }
  return result.value;
};

const countBinary = (
  module: IrModule,
  overflow: "guarded" | "wrapping" | undefined
): number =>
  module.functions
    .flatMap((fn) => fn.blocks)
    .flatMap((block) => block.instructions)
    .filter((inst) => inst.kind === "binary" && inst.overflow === overflow)
    .length;

const countPanics = (module: IrModule): number =>
  module.functions
    .flatMap((fn) => fn.blocks)
    .flatMap((block) => block.instructions)
    .filter((inst) => inst.kind === "call" && inst.callee === "panic").length;

const CALC = `
export function calc(a: int32, b: int32): int32 {
  const s = a + b;
  return s * 2;
}
`;

describe("Overflow Check Pass", () => {
  it("should guard every qualifying operation", () => {
    const module = compile(CALC);
    const result = runOverflowCheckPass([module]);

    expect(result.ok).to.equal(true);
    expect(result.diagnostics).to.deep.equal([]);
    expect(result.stats).to.deep.equal([
      {
        filePath: "main.ts",
        packagePath: "main",
        exempt: false,
        instrumented: 2,
        unchanged: 7,
      },
    ]);

    const [instrumented] = result.modules;
    if (instrumented === undefined) throw new Error("no module");
    expect(countBinary(instrumented, undefined)).to.equal(0);
    expect(countBinary(instrumented, "guarded")).to.equal(2);
    expect(countPanics(instrumented)).to.equal(2);
  });

  it("should produce IR that passes verification", () => {
    const source = `
export function all(a: int8, b: int16, c: int32): int32 {
  const x = a * a;
  const y = b / b;
  let z = c - 1;
  z += c;
  return z;
}
`;
    for (const multiply of ["widen", "backDivide"] as const) {
      const result = runOverflowCheckPass([compile(source)], { multiply });
      expect(result.ok).to.equal(true);
      expect(verifyModules(result.modules).diagnostics).to.deep.equal([]);
    }
  });

  it("should change nothing when run a second time", () => {
    const once = runOverflowCheckPass([compile(CALC)]);
    const twice = runOverflowCheckPass(once.modules);

    expect(twice.ok).to.equal(true);
    expect(twice.modules.map(printModule)).to.deep.equal(
      once.modules.map(printModule)
    );
    expect(twice.stats.map((s) => s.instrumented)).to.deep.equal([0]);
  });

  it("should leave an exempt package untouched", () => {
    const module = compile(CALC, "math");
    const result = runOverflowCheckPass([module]);

    expect(result.ok).to.equal(true);
    expect(result.modules[0]).to.equal(module);
    expect(result.stats).to.deep.equal([
      {
        filePath: "main.ts",
        packagePath: "math",
        exempt: true,
        instrumented: 0,
        unchanged: 9,
      },
    ]);
  });

  it("should exempt packages under an exempt prefix", () => {
    const module = compile(CALC, "internal/abi");
    const result = runOverflowCheckPass([module]);

    expect(result.modules[0]).to.equal(module);
  });

  it("should use the exemption set it is given", () => {
    const exemptions = createExemptionSet(["main"]);
    if (!exemptions.ok) throw new Error("invalid exemptions");

    const mainResult = runOverflowCheckPass([compile(CALC)], {
      exemptions: exemptions.value,
    });
    const mathResult = runOverflowCheckPass([compile(CALC, "math")], {
      exemptions: exemptions.value,
    });

    expect(mainResult.stats.map((s) => s.exempt)).to.deep.equal([true]);
    expect(mathResult.stats.map((s) => s.instrumented)).to.deep.equal([2]);
  });

  it("should not touch unsigned, 64-bit or pointer-sized arithmetic", () => {
    const source = `
export function wide(a: uint32, b: int64, c: isize, d: uint8): int64 {
  const w = a + a;
  const x = c * c;
  const y = d - d;
  return b * b;
}
`;
    const module = compile(source);
    const result = runOverflowCheckPass([module]);

    expect(result.stats.map((s) => s.instrumented)).to.deep.equal([0]);
    expect(result.modules.map(printModule)).to.deep.equal([printModule(module)]);
  });

  it("should not touch remainder, bitwise or shift operations", () => {
    const source = `
export function bits(a: int32, b: int32): int32 {
  return ((a % b) & (a | b)) ^ ((a << 2) >> 1);
}
`;
    const result = runOverflowCheckPass([compile(source)]);

    expect(result.stats.map((s) => s.instrumented)).to.deep.equal([0]);
  });

  it("should report malformed arithmetic as an internal compiler error", () => {
    const module: IrModule = {
      kind: "module",
      filePath: "broken.ts",
      packagePath: "main",
      functions: [
        {
          kind: "function",
          name: "broken",
          isExported: false,
          parameters: [{ name: "a", type: boolType, temp: "a" }],
          returnType: intType("Int32"),
          locals: [],
          blocks: [
            {
              id: "entry",
              instructions: [
                {
                  kind: "binary",
                  dest: "t0",
                  operator: "add",
                  left: "a",
                  right: "a",
                  type: boolType,
                },
              ],
              terminator: { kind: "return", value: "t0" },
            },
          ],
        },
      ],
    };

    const result = runOverflowCheckPass([module]);

    expect(result.ok).to.equal(false);
    expect(result.diagnostics.map((d) => [d.code, d.message])).to.deep.equal([
      [
        "IG6001",
        "Internal compiler error: malformed arithmetic in broken (block entry): binary 'add' on non-integer type 'boolType'",
      ],
    ]);
    expect(result.diagnostics[0]?.location?.file).to.equal("broken.ts");
  });

  it("should guard operations inside loops and branches", () => {
    const source = `
export function sum(n: int16): int16 {
  let total: int16 = 0;
  for (let i: int16 = 1; i <= n; i++) {
    if (i % 2 == 0) {
      total += i;
    } else {
      total -= 1;
    }
  }
  return total;
}
`;
    const result = runOverflowCheckPass([compile(source)]);

    // i++, total += i, total -= 1
    expect(result.stats.map((s) => s.instrumented)).to.deep.equal([3]);
    expect(verifyModules(result.modules).ok).to.equal(true);
  });
});

/**
 * Tests for the IR verifier
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { IrBlock, IrModule, intType } from "../types/index.js";
import { verifyModule } from "./ir-verifier.js";

const int32 = intType("Int32");

const moduleWith = (blocks: readonly IrBlock[]): IrModule => ({
  kind: "module",
  filePath: "main.ts",
  packagePath: "main",
  functions: [
    {
      kind: "function",
      name: "f",
      isExported: true,
      parameters: [{ name: "a", type: int32, temp: "a" }],
      returnType: int32,
      locals: [{ name: "x", type: int32 }],
      blocks,
    },
  ],
});

const messages = (module: IrModule): string[] =>
  verifyModule(module).diagnostics.map((d) => d.message);

describe("IR Verifier", () => {
  it("should accept well-formed IR", () => {
    const module = moduleWith([
      {
        id: "entry",
        instructions: [
          { kind: "store", local: "x", value: "a" },
          { kind: "load", dest: "t0", local: "x", type: int32 },
        ],
        terminator: { kind: "jump", target: "exit" },
      },
      { id: "exit", instructions: [], terminator: { kind: "return", value: "t0" } },
    ]);

    expect(verifyModule(module)).to.deep.equal({ ok: true, diagnostics: [] });
  });

  it("should report temporaries defined twice", () => {
    const module = moduleWith([
      {
        id: "entry",
        instructions: [
          { kind: "constInt", dest: "t0", type: int32, value: 1n },
          { kind: "constInt", dest: "t0", type: int32, value: 2n },
        ],
        terminator: { kind: "return", value: "t0" },
      },
    ]);

    expect(messages(module)).to.deep.equal([
      "Internal compiler error: function f defines %t0 twice",
    ]);
  });

  it("should report undefined temporaries, unknown locals and unknown blocks", () => {
    const module = moduleWith([
      {
        id: "entry",
        instructions: [{ kind: "store", local: "y", value: "t9" }],
        terminator: { kind: "jump", target: "nowhere" },
      },
    ]);

    expect(messages(module)).to.deep.equal([
      "Internal compiler error: f/entry: %t9 is used but never defined",
      "Internal compiler error: f/entry: unknown local 'y'",
      "Internal compiler error: f/entry: branch to unknown block nowhere",
    ]);
  });

  it("should accept calls to panic and reject unknown callees", () => {
    const module = moduleWith([
      {
        id: "entry",
        instructions: [
          { kind: "constString", dest: "m", value: "stop" },
          { kind: "call", callee: "panic", args: ["m"], type: { kind: "voidType" } },
          { kind: "call", callee: "missing", args: [], type: { kind: "voidType" } },
        ],
        terminator: { kind: "unreachable" },
      },
    ]);

    expect(messages(module)).to.deep.equal([
      "Internal compiler error: f/entry: call to unknown function 'missing'",
    ]);
  });

  it("should report duplicate block ids and empty functions", () => {
    const duplicate = moduleWith([
      { id: "entry", instructions: [], terminator: { kind: "return", value: "a" } },
      { id: "entry", instructions: [], terminator: { kind: "return", value: "a" } },
    ]);

    expect(messages(duplicate)).to.deep.equal([
      "Internal compiler error: function f defines block entry twice",
    ]);
    expect(messages(moduleWith([]))).to.deep.equal([
      "Internal compiler error: function f has no blocks",
    ]);
  });
});

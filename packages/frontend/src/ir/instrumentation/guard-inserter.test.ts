/**
 * Tests for guard insertion
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { IrFunction, intType } from "../types/index.js";
import { createNameSupply } from "../name-supply.js";
import { printFunction } from "../printer.js";
import { verifyModule } from "../validation/ir-verifier.js";
import { buildPredicate } from "./overflow-predicate.js";
import {
  OVERFLOW_PANIC_MESSAGE,
  guardOperation,
  insertGuard,
} from "./guard-inserter.js";

const int8 = intType("Int8");

const location = { file: "/src/main.ts", line: 2, column: 10, length: 5 };

const createAddFunction = (): IrFunction => ({
  kind: "function",
  name: "add8",
  isExported: false,
  parameters: [
    { name: "a", type: int8, temp: "a" },
    { name: "b", type: int8, temp: "b" },
  ],
  returnType: int8,
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
          right: "b",
          type: int8,
          location,
        },
      ],
      terminator: { kind: "return", value: "t0" },
    },
  ],
});

describe("Guard Inserter", () => {
  it("should split the block into check, panic and continuation blocks", () => {
    const fn = createAddFunction();
    const result = insertGuard(
      fn,
      "entry",
      0,
      buildPredicate("add", "Int8"),
      createNameSupply(fn)
    );

    expect(result.continuation).to.equal("overflow.cont.1");
    expect(printFunction(result.fn)).to.equal(
      [
        "fn add8(%a: int8, %b: int8): int8 {",
        "entry:",
        "  %ovf0 = const int8 0",
        "  %ovf1 = cmp.ge int8 %b, %ovf0",
        "  br %ovf1, overflow.check.3, overflow.check.2",
        "overflow.check.3:",
        "  %ovf2 = const int8 127",
        "  %ovf3 = sub.wrapping int8 %ovf2, %b",
        "  %ovf4 = cmp.gt int8 %a, %ovf3",
        "  br %ovf4, overflow.panic.0, overflow.check.2",
        "overflow.check.2:",
        "  %ovf5 = const int8 0",
        "  %ovf6 = cmp.lt int8 %b, %ovf5",
        "  br %ovf6, overflow.check.4, overflow.cont.1",
        "overflow.check.4:",
        "  %ovf7 = const int8 -128",
        "  %ovf8 = sub.wrapping int8 %ovf7, %b",
        "  %ovf9 = cmp.lt int8 %a, %ovf8",
        "  br %ovf9, overflow.panic.0, overflow.cont.1",
        "overflow.panic.0:",
        '  %ovf10 = const string "integer overflow"',
        "  call panic(%ovf10)",
        "  unreachable",
        "overflow.cont.1:",
        "  %t0 = add.guarded int8 %a, %b",
        "  ret %t0",
        "}",
      ].join("\n")
    );
  });

  it("should produce IR that passes verification", () => {
    const fn = createAddFunction();
    const result = insertGuard(
      fn,
      "entry",
      0,
      buildPredicate("mul", "Int8", "widen"),
      createNameSupply(fn)
    );

    const verification = verifyModule({
      kind: "module",
      filePath: "main.ts",
      packagePath: "main",
      functions: [result.fn],
    });
    expect(verification.diagnostics).to.deep.equal([]);
  });

  it("should keep the original operands, destination and location", () => {
    const fn = createAddFunction();
    const block = fn.blocks[0];
    if (block === undefined) throw new Error("missing entry block");

    const node = guardOperation(
      block,
      0,
      buildPredicate("div", "Int8"),
      createNameSupply(fn)
    );

    expect(node.continuation.instructions[0]).to.deep.equal({
      kind: "binary",
      dest: "t0",
      operator: "add",
      left: "a",
      right: "b",
      type: int8,
      location,
      overflow: "guarded",
    });
    expect(node.continuation.terminator).to.deep.equal({
      kind: "return",
      value: "t0",
    });
    expect(node.head.id).to.equal("entry");
  });

  it("should build a panic block that reports the operation's location", () => {
    const fn = createAddFunction();
    const block = fn.blocks[0];
    if (block === undefined) throw new Error("missing entry block");

    const node = guardOperation(
      block,
      0,
      buildPredicate("div", "Int8"),
      createNameSupply(fn)
    );

    expect(node.panic.instructions).to.deep.equal([
      { kind: "constString", dest: "ovf4", value: OVERFLOW_PANIC_MESSAGE },
      {
        kind: "call",
        callee: "panic",
        args: ["ovf4"],
        type: { kind: "voidType" },
        location,
      },
    ]);
    expect(node.panic.terminator).to.deep.equal({ kind: "unreachable" });
  });

  it("should keep instructions before the operation in the head", () => {
    const fn: IrFunction = {
      ...createAddFunction(),
      locals: [{ name: "x", type: int8 }],
      blocks: [
        {
          id: "entry",
          instructions: [
            { kind: "store", local: "x", value: "a" },
            {
              kind: "binary",
              dest: "t0",
              operator: "sub",
              left: "a",
              right: "b",
              type: int8,
            },
            { kind: "store", local: "x", value: "t0" },
          ],
          terminator: { kind: "return", value: "t0" },
        },
      ],
    };
    const block = fn.blocks[0];
    if (block === undefined) throw new Error("missing entry block");

    const node = guardOperation(
      block,
      1,
      buildPredicate("sub", "Int8"),
      createNameSupply(fn)
    );

    expect(node.head.instructions[0]).to.deep.equal({
      kind: "store",
      local: "x",
      value: "a",
    });
    expect(node.continuation.instructions.map((i) => i.kind)).to.deep.equal([
      "binary",
      "store",
    ]);
  });

  it("should reject an index that does not hold a binary instruction", () => {
    const fn = createAddFunction();
    const block = fn.blocks[0];
    if (block === undefined) throw new Error("missing entry block");

    expect(() =>
      guardOperation(block, 3, buildPredicate("add", "Int8"), createNameSupply(fn))
    ).to.throw("Block entry has no binary instruction at index 3");
  });
});

/**
 * Tests for program creation
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createProgram, createProgramFromSources } from "./creation.js";

describe("Program Creation", () => {
  it("should read source files from disk", () => {
    const tempDir = fs.mkdtempSync(
      path.join(os.tmpdir(), "intguard-program-creation-")
    );

    try {
      const srcDir = path.join(tempDir, "src");
      fs.mkdirSync(srcDir, { recursive: true });
      const entryPath = path.join(srcDir, "main.ts");
      fs.writeFileSync(
        entryPath,
        "export function one(): int32 {\n  return 1;\n}\n"
      );

      const result = createProgram([entryPath], { sourceRoot: srcDir });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.sourceFiles.map((f) => f.fileName)).to.deep.equal([
        path.resolve(entryPath),
      ]);
      expect(result.value.options.sourceRoot).to.equal(srcDir);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it("should report a missing source file", () => {
    const missing = path.join(os.tmpdir(), "intguard-missing", "nope.ts");

    const result = createProgram([missing], { sourceRoot: "/src" });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.hasErrors).to.equal(true);
    expect(result.error.diagnostics.map((d) => [d.code, d.message])).to.deep.equal([
      ["IG1001", `Source file not found: ${missing}`],
    ]);
  });

  it("should build a program from in-memory sources", () => {
    const result = createProgramFromSources(
      new Map([["/src/a.ts", "export function a(): int32 { return 1; }\n"]]),
      { sourceRoot: "/src" }
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.sourceFiles.map((f) => f.fileName)).to.deep.equal([
      "/src/a.ts",
    ]);
  });

  it("should report syntax errors with their location", () => {
    const result = createProgramFromSources(
      new Map([["/src/bad.ts", "export function f(a: int32 {\n  return a;\n}\n"]]),
      { sourceRoot: "/src" }
    );

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    const [first] = result.error.diagnostics;
    expect(first?.code).to.equal("IG1003");
    expect(first?.severity).to.equal("error");
    expect(first?.location?.file).to.equal("/src/bad.ts");
    expect(first?.location?.line).to.equal(1);
  });
});

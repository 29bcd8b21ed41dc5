/**
 * Tests for the emit command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { captureOutput, withSourceFile } from "../test-harness.js";
import { emitCommand } from "./emit.js";

const SOURCE = `export function main(a: int8, b: int8): int8 {
  return a + b;
}
`;

describe("emitCommand", () => {
  it("should write the instrumented IR to stdout", () => {
    withSourceFile(SOURCE, {}, (config) => {
      let emitted: string | undefined;
      const output = captureOutput(() => {
        const result = emitCommand(config);
        emitted = result.ok ? result.value.output : undefined;
      });

      expect(emitted).to.be.a("string");
      expect(emitted).to.contain('call panic(');
      expect(output).to.deep.equal({ stdout: [emitted], stderr: [] });
    });
  });

  it("should write nothing when quiet", () => {
    withSourceFile(SOURCE, { quiet: true }, (config) => {
      let emitted: string | undefined;
      const output = captureOutput(() => {
        const result = emitCommand(config);
        emitted = result.ok ? result.value.output : undefined;
      });

      expect(emitted?.startsWith('module "main" (main.ts)\n')).to.equal(true);
      expect(output).to.deep.equal({ stdout: [], stderr: [] });
    });
  });
});

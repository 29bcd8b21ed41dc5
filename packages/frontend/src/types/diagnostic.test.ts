/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  collectDiagnostics,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "IG2002",
        "error",
        "Literal 300 is out of range for type int8",
        {
          file: "main.ts",
          line: 10,
          column: 5,
          length: 3,
        },
        "Convert explicitly with 'as'."
      );

      expect(diagnostic.code).to.equal("IG2002");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.location?.file).to.equal("main.ts");
      expect(diagnostic.hint).to.equal("Convert explicitly with 'as'.");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("IG3003", "warning", "Test warning");

      expect(diagnostic.code).to.equal("IG3003");
      expect(diagnostic.severity).to.equal("warning");
      expect(diagnostic.location).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("formatDiagnostic", () => {
    it("should format diagnostic with location", () => {
      const diagnostic = createDiagnostic(
        "IG2005",
        "error",
        "Cannot find name 'y'",
        {
          file: "/src/main.ts",
          line: 5,
          column: 10,
          length: 1,
        }
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "/src/main.ts:5:10 error IG2005: Cannot find name 'y'"
      );
    });

    it("should format diagnostic without location", () => {
      const diagnostic = createDiagnostic(
        "IG3001",
        "error",
        "Config file not found"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "error IG3001: Config file not found"
      );
    });

    it("should include hint if present", () => {
      const diagnostic = createDiagnostic(
        "IG2001",
        "error",
        "'var' is not supported",
        undefined,
        "Use 'let'."
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "error IG2001: 'var' is not supported Hint: Use 'let'."
      );
    });
  });

  describe("collectDiagnostics", () => {
    it("should keep diagnostics in order", () => {
      const first = createDiagnostic("IG2001", "error", "Error 1");
      const second = createDiagnostic("IG1003", "warning", "Warning 1");

      expect(collectDiagnostics([first, second]).diagnostics).to.deep.equal([
        first,
        second,
      ]);
    });

    it("should report errors only for error severity", () => {
      expect(
        collectDiagnostics([
          createDiagnostic("IG1003", "warning", "Warning"),
          createDiagnostic("IG1003", "info", "Info"),
        ]).hasErrors
      ).to.be.false;
      expect(
        collectDiagnostics([
          createDiagnostic("IG1003", "warning", "Warning"),
          createDiagnostic("IG1003", "error", "Error"),
        ]).hasErrors
      ).to.be.true;
    });

    it("should accept an empty list", () => {
      expect(collectDiagnostics([])).to.deep.equal({
        diagnostics: [],
        hasErrors: false,
      });
    });
  });

  describe("isError", () => {
    it("should identify error diagnostics", () => {
      const error = createDiagnostic("IG2001", "error", "Test");
      const warning = createDiagnostic("IG2001", "warning", "Test");
      const info = createDiagnostic("IG2001", "info", "Test");

      expect(isError(error)).to.be.true;
      expect(isError(warning)).to.be.false;
      expect(isError(info)).to.be.false;
    });
  });
});

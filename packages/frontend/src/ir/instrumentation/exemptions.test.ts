/**
 * Tests for package exemptions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  DEFAULT_EXEMPTION_SET,
  createExemptionSet,
  extendExemptionSet,
  isExempt,
  shouldInstrument,
} from "./exemptions.js";

describe("Exemption Filter", () => {
  describe("default set", () => {
    it("should exempt the runtime-level packages", () => {
      for (const path of ["runtime", "sync", "os", "syscall", "math", "unsafe"]) {
        expect(shouldInstrument(path), path).to.equal(false);
      }
    });

    it("should exempt everything under internal/", () => {
      expect(shouldInstrument("internal/abi")).to.equal(false);
      expect(shouldInstrument("internal/runtime/atomic")).to.equal(false);
      expect(shouldInstrument("internal")).to.equal(false);
    });

    it("should instrument user packages", () => {
      expect(shouldInstrument("main")).to.equal(true);
      expect(shouldInstrument("my-lib/src")).to.equal(true);
    });

    it("should match literal entries exactly", () => {
      expect(shouldInstrument("math/bits")).to.equal(true);
      expect(shouldInstrument("sync/atomic")).to.equal(true);
      expect(shouldInstrument("mathx")).to.equal(true);
    });

    it("should not treat a shared name prefix as a path prefix", () => {
      expect(shouldInstrument("internals")).to.equal(true);
      expect(shouldInstrument("internalfoo/bar")).to.equal(true);
    });

    it("should be frozen", () => {
      expect(Object.isFrozen(DEFAULT_EXEMPTION_SET)).to.equal(true);
      expect(Object.isFrozen(DEFAULT_EXEMPTION_SET.prefixes)).to.equal(true);
      expect(Object.isFrozen(DEFAULT_EXEMPTION_SET.literals)).to.equal(true);
    });

    it("should reject additions to the shared literal entries", () => {
      expect(() =>
        Reflect.apply(Array.prototype.push, DEFAULT_EXEMPTION_SET.literals, [
          "main",
        ])
      ).to.throw(TypeError);
      expect(DEFAULT_EXEMPTION_SET.literals).to.deep.equal([
        "runtime",
        "sync",
        "os",
        "syscall",
        "math",
        "unsafe",
      ]);
      expect(shouldInstrument("main")).to.equal(true);
    });
  });

  describe("createExemptionSet", () => {
    it("should split literal and prefix entries", () => {
      const result = createExemptionSet(["vendor/legacy", "gen/*"]);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect([...result.value.literals]).to.deep.equal(["vendor/legacy"]);
      expect(result.value.prefixes).to.deep.equal(["gen"]);
      expect(isExempt("gen/proto/v1", result.value)).to.equal(true);
      expect(isExempt("vendor/legacy/sub", result.value)).to.equal(false);
    });

    it("should reject malformed entries", () => {
      const result = createExemptionSet(["", "a*b", "/abs", "a//b", "/*"]);

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.code)).to.deep.equal([
        "IG3004",
        "IG3004",
        "IG3004",
        "IG3004",
        "IG3004",
      ]);
      expect(result.error.map((d) => d.message)).to.deep.equal([
        "Invalid exemption entry '': empty package path",
        "Invalid exemption entry 'a*b': '*' is only allowed as a trailing '/*'",
        "Invalid exemption entry '/abs': package paths do not start or end with '/'",
        "Invalid exemption entry 'a//b': empty path segment",
        "Invalid exemption entry '/*': empty package path",
      ]);
    });
  });

  describe("extendExemptionSet", () => {
    it("should add entries without changing the base set", () => {
      const result = extendExemptionSet(DEFAULT_EXEMPTION_SET, ["legacy"]);

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(isExempt("legacy", result.value)).to.equal(true);
      expect(isExempt("runtime", result.value)).to.equal(true);
      expect(isExempt("internal/abi", result.value)).to.equal(true);
      expect(isExempt("legacy", DEFAULT_EXEMPTION_SET)).to.equal(false);
      expect(Object.isFrozen(result.value)).to.equal(true);
    });

    it("should report invalid extra entries", () => {
      const result = extendExemptionSet(DEFAULT_EXEMPTION_SET, ["bad*"]);

      expect(result.ok).to.equal(false);
    });
  });
});

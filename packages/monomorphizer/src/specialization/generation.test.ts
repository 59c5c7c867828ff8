/**
 * Tests for the specialization context
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { IrType } from "@cinder/frontend";
import {
  createSpecializationContext,
  getSpecializations,
  needsSpecialization,
  registerOriginalFunction,
  replaceSpecialization,
  specializeFunction,
} from "./generation.js";
import { createSpecializationKey } from "./helpers.js";
import {
  binary,
  ident,
  int,
  named,
  param,
  ret,
  fn,
  returnedExpression,
} from "../test-harness.js";

const arrayOf = (size: string): IrType => ({
  kind: "arrayType",
  elementType: named("u8"),
  size: ident(size),
});

describe("Specialization context", () => {
  describe("needsSpecialization", () => {
    it("should be true for functions with compile-time parameters", () => {
      expect(needsSpecialization(fn("f", { comptime: [["N", "int"]] }))).to.equal(
        true
      );
    });

    it("should be false for plain functions", () => {
      expect(needsSpecialization(fn("main"))).to.equal(false);
    });
  });

  describe("registerOriginalFunction", () => {
    it("should store a declaration by name", () => {
      const context = createSpecializationContext();
      const f = fn("f", { comptime: [["N", "int"]] });
      registerOriginalFunction(context, f);
      expect(context.originalFunctions.get("f")).to.equal(f);
    });

    it("should keep the first registration", () => {
      const context = createSpecializationContext();
      const first = fn("f", { comptime: [["N", "int"]] });
      const second = fn("f", { comptime: [["M", "bool"]] });
      registerOriginalFunction(context, first);
      registerOriginalFunction(context, second);
      expect(context.originalFunctions.get("f")).to.equal(first);
      expect(context.originalFunctions.size).to.equal(1);
    });

    it("should not share state between contexts", () => {
      const a = createSpecializationContext();
      const b = createSpecializationContext();
      registerOriginalFunction(a, fn("f", { comptime: [["N", "int"]] }));
      expect(b.originalFunctions.has("f")).to.equal(false);
    });
  });

  describe("specializeFunction", () => {
    it("should substitute the parameter in the body", () => {
      const context = createSpecializationContext();
      const f = fn("f", {
        comptime: [["N", "int"]],
        returnType: named("int"),
        body: [ret(ident("N"))],
      });

      const specialized = specializeFunction(context, f, [42n]);

      expect(specialized.name).to.equal("f_42");
      expect(specialized.comptimeParameters).to.deep.equal([]);
      expect(returnedExpression(specialized)).to.deep.equal({
        kind: "intLiteral",
        value: 42n,
      });
    });

    it("should fold arithmetic on the parameter", () => {
      const context = createSpecializationContext();
      const f = fn("f", {
        comptime: [["N", "int"]],
        body: [ret(binary("*", ident("N"), int(2)))],
      });

      expect(
        returnedExpression(specializeFunction(context, f, [10n]))
      ).to.deep.equal({ kind: "intLiteral", value: 20n });
    });

    it("should keep binary nodes when folding is disabled", () => {
      const context = createSpecializationContext({ foldConstants: false });
      const f = fn("f", {
        comptime: [["N", "int"]],
        body: [ret(binary("*", ident("N"), int(2)))],
      });

      expect(
        returnedExpression(specializeFunction(context, f, [10n]))
      ).to.deep.equal(binary("*", int(10), int(2)));
    });

    it("should substitute parameter and return types", () => {
      const context = createSpecializationContext();
      const f = fn("fill", {
        comptime: [["N", "int"]],
        parameters: [param("buf", arrayOf("N"))],
        returnType: arrayOf("N"),
      });

      const specialized = specializeFunction(context, f, [256n]);
      const expected: IrType = {
        kind: "arrayType",
        elementType: named("u8"),
        size: int(256),
      };

      expect(specialized.parameters).to.deep.equal([
        { kind: "parameter", name: "buf", type: expected },
      ]);
      expect(specialized.returnType).to.deep.equal(expected);
    });

    it("should bind several parameters positionally", () => {
      const context = createSpecializationContext();
      const f = fn("configure", {
        comptime: [
          ["SIZE", "int"],
          ["DEBUG", "bool"],
        ],
        body: [ret(ident("DEBUG")), ret(ident("SIZE"))],
      });

      const specialized = specializeFunction(context, f, [512n, true]);

      expect(specialized.name).to.equal("configure_512_true");
      expect(specialized.body.statements).to.deep.equal([
        ret({ kind: "boolLiteral", value: true }),
        ret(int(512)),
      ]);
    });

    it("should return the same object for the same key", () => {
      const context = createSpecializationContext();
      const f = fn("f", { comptime: [["N", "int"]], body: [ret(ident("N"))] });

      const first = specializeFunction(context, f, [10n]);
      const second = specializeFunction(context, f, [10n]);

      expect(second).to.equal(first);
      expect(getSpecializations(context)).to.have.lengthOf(1);
    });

    it("should create distinct declarations for distinct arguments", () => {
      const context = createSpecializationContext();
      const f = fn("f", { comptime: [["N", "int"]], body: [ret(ident("N"))] });

      const ten = specializeFunction(context, f, [10n]);
      const twenty = specializeFunction(context, f, [20n]);

      expect(ten).to.not.equal(twenty);
      expect(ten.name).to.equal("f_10");
      expect(twenty.name).to.equal("f_20");
      expect(getSpecializations(context)).to.deep.equal([ten, twenty]);
    });

    it("should not confuse an integer 1 with true", () => {
      const context = createSpecializationContext();
      const f = fn("f", { comptime: [["X", "int"]] });

      const one = specializeFunction(context, f, [1n]);
      const yes = specializeFunction(context, f, [true]);

      expect(one).to.not.equal(yes);
    });

    it("should leave the original declaration untouched", () => {
      const context = createSpecializationContext();
      const f = fn("f", { comptime: [["N", "int"]], body: [ret(ident("N"))] });

      specializeFunction(context, f, [7n]);

      expect(f.name).to.equal("f");
      expect(f.comptimeParameters).to.have.lengthOf(1);
      expect(returnedExpression(f)).to.deep.equal(ident("N"));
    });
  });

  describe("replaceSpecialization", () => {
    it("should make later lookups return the replacement", () => {
      const context = createSpecializationContext();
      const f = fn("f", { comptime: [["N", "int"]], body: [ret(ident("N"))] });
      const original = specializeFunction(context, f, [1n]);
      const replacement = { ...original, isUnsafe: true };

      replaceSpecialization(context, createSpecializationKey("f", [1n]), replacement);

      expect(specializeFunction(context, f, [1n])).to.equal(replacement);
      expect(getSpecializations(context)).to.deep.equal([replacement]);
    });

    it("should reject unknown keys", () => {
      const context = createSpecializationContext();
      expect(() =>
        replaceSpecialization(context, "missing[]", fn("missing"))
      ).to.throw("ICE: No specialization stored under 'missing[]'");
    });
  });
});

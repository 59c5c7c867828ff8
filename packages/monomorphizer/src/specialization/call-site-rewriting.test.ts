/**
 * Tests for call-site rewriting
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { IrCallExpression, IrStatement } from "@cinder/frontend";
import {
  getCalleeName,
  rewriteCallSite,
  rewriteCallSites,
  rewriteExpression,
  shouldRewriteCall,
} from "./call-site-rewriting.js";
import {
  createSpecializationContext,
  registerOriginalFunction,
} from "./generation.js";
import {
  block,
  call,
  exprStmt,
  fn,
  ident,
  int,
  letStmt,
  ret,
} from "../test-harness.js";

const member: IrCallExpression = call(
  { kind: "fieldAccess", object: ident("obj"), field: "method" },
  [int(1)]
);

describe("Call-site rewriting", () => {
  describe("getCalleeName", () => {
    it("should return the name of an identifier callee", () => {
      expect(getCalleeName(call("double"))).to.equal("double");
    });

    it("should return undefined for a member callee", () => {
      expect(getCalleeName(member)).to.equal(undefined);
    });
  });

  describe("shouldRewriteCall", () => {
    const context = createSpecializationContext();
    registerOriginalFunction(context, fn("double", { comptime: [["N", "int"]] }));

    it("should accept a call to a registered function with arguments", () => {
      expect(shouldRewriteCall(context, call("double", [int(2)]))).to.equal(
        true
      );
    });

    it("should reject a call without compile-time arguments", () => {
      expect(shouldRewriteCall(context, call("double"))).to.equal(false);
    });

    it("should reject an unregistered name", () => {
      expect(shouldRewriteCall(context, call("triple", [int(3)]))).to.equal(
        false
      );
    });

    it("should reject a member callee", () => {
      expect(shouldRewriteCall(context, member)).to.equal(false);
    });
  });

  describe("rewriteCallSite", () => {
    it("should rename the callee and drop compile-time arguments", () => {
      const original = call("double", [int(2)], [int(5)]);
      expect(rewriteCallSite(original, "double_2")).to.deep.equal(
        call("double_2", [], [int(5)])
      );
    });

    it("should leave the original call untouched", () => {
      const original = call("double", [int(2)], [int(5)]);
      rewriteCallSite(original, "double_2");
      expect(original.compileTimeArguments).to.have.lengthOf(1);
      expect(getCalleeName(original)).to.equal("double");
    });

    it("should refuse a member callee", () => {
      expect(() => rewriteCallSite(member, "method_1")).to.throw(
        "ICE: Cannot rewrite call with 'fieldAccess' callee to 'method_1'"
      );
    });
  });

  describe("rewriteCallSites", () => {
    it("should rewrite a resolved call inside a statement", () => {
      const target = call("double", [int(2)], [int(5)]);
      const result = rewriteCallSites(
        block(letStmt("x", target)),
        new Map([[target, "double_2"]])
      );
      expect(result).to.deep.equal(
        block(letStmt("x", call("double_2", [], [int(5)])))
      );
    });

    it("should leave unresolved calls as they were", () => {
      const unresolved = call("other", [int(1)]);
      const result = rewriteCallSites(block(exprStmt(unresolved)), new Map());
      expect(result).to.deep.equal(block(exprStmt(call("other", [int(1)]))));
    });

    it("should match calls by identity, not by shape", () => {
      const first = call("double", [int(2)]);
      const twin = call("double", [int(2)]);
      const result = rewriteCallSites(
        block(exprStmt(first), exprStmt(twin)),
        new Map([[first, "double_2"]])
      );
      expect(result).to.deep.equal(
        block(exprStmt(call("double_2")), exprStmt(call("double", [int(2)])))
      );
    });

    it("should rewrite nested resolved calls", () => {
      const inner = call("g", [int(2)]);
      const outer = call("f", [int(1)], [inner]);
      const result = rewriteExpression(
        outer,
        new Map([
          [outer, "f_1"],
          [inner, "g_2"],
        ])
      );
      expect(result).to.deep.equal(call("f_1", [], [call("g_2")]));
    });

    it("should rewrite inside match arms and closures", () => {
      const inArm = call("f", [int(1)]);
      const inClosure = call("f", [int(2)]);
      const stmt: IrStatement = {
        kind: "matchStatement",
        scrutinee: ident("x"),
        arms: [
          {
            pattern: { kind: "wildcardPattern" },
            body: block(
              exprStmt({
                kind: "closure",
                parameters: [],
                body: block(ret(inClosure)),
                isMove: false,
              }),
              exprStmt(inArm)
            ),
          },
        ],
      };
      const result = rewriteCallSites(
        block(stmt),
        new Map([
          [inArm, "f_1"],
          [inClosure, "f_2"],
        ])
      );
      expect(result).to.deep.equal(
        block({
          kind: "matchStatement",
          scrutinee: ident("x"),
          arms: [
            {
              pattern: { kind: "wildcardPattern" },
              guard: undefined,
              body: block(
                exprStmt({
                  kind: "closure",
                  parameters: [],
                  body: block(ret(call("f_2"))),
                  isMove: false,
                }),
                exprStmt(call("f_1"))
              ),
            },
          ],
        })
      );
    });

    it("should not mutate the input block", () => {
      const target = call("double", [int(2)]);
      const input = block(exprStmt(target));
      rewriteCallSites(input, new Map([[target, "double_2"]]));
      expect(input).to.deep.equal(block(exprStmt(call("double", [int(2)]))));
    });
  });
});

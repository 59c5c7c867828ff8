/**
 * Call-site rewriting after specialization
 *
 * `double[2](5)` becomes `double_2(5)` once `double_2` exists. Rewriting
 * rebuilds the tree around resolved calls; the input is never mutated.
 */

import type {
  IrBlock,
  IrCallExpression,
  IrExpression,
  IrStatement,
} from "@cinder/frontend";
import type { SpecializationContext } from "./types.js";
import { unhandledNode } from "./helpers.js";

/**
 * Resolved calls, keyed by the call node found during collection
 */
export type ResolvedCalls = ReadonlyMap<IrCallExpression, string>;

/**
 * Name of a call's callee when it is a plain identifier
 */
export const getCalleeName = (call: IrCallExpression): string | undefined =>
  call.callee.kind === "identifier" ? call.callee.name : undefined;

/**
 * A call is rewritten when it passes compile-time arguments to a plain
 * name that is a registered generic function. Member and computed callees
 * are left alone.
 */
export const shouldRewriteCall = (
  context: SpecializationContext,
  call: IrCallExpression
): boolean => {
  if (call.compileTimeArguments.length === 0) {
    return false;
  }
  const name = getCalleeName(call);
  return name !== undefined && context.originalFunctions.has(name);
};

/**
 * Point a call at its specialization and drop its compile-time arguments
 */
export const rewriteCallSite = (
  call: IrCallExpression,
  specializedName: string
): IrCallExpression => {
  if (call.callee.kind !== "identifier") {
    throw new Error(
      `ICE: Cannot rewrite call with '${call.callee.kind}' callee to '${specializedName}'`
    );
  }
  return {
    ...call,
    callee: { ...call.callee, name: specializedName },
    compileTimeArguments: [],
  };
};

export const rewriteCallSites = (
  block: IrBlock,
  resolved: ResolvedCalls
): IrBlock => ({
  ...block,
  statements: block.statements.map((stmt) =>
    rewriteStatement(stmt, resolved)
  ),
});

export const rewriteStatement = (
  stmt: IrStatement,
  resolved: ResolvedCalls
): IrStatement => {
  const expr = (e: IrExpression): IrExpression => rewriteExpression(e, resolved);
  const block = (b: IrBlock): IrBlock => rewriteCallSites(b, resolved);

  switch (stmt.kind) {
    case "variableDeclaration":
      return { ...stmt, initializer: expr(stmt.initializer) };

    case "assignment":
      return { ...stmt, target: expr(stmt.target), value: expr(stmt.value) };

    case "expressionStatement":
      return { ...stmt, expression: expr(stmt.expression) };

    case "returnStatement":
      return {
        ...stmt,
        expression: stmt.expression ? expr(stmt.expression) : undefined,
      };

    case "ifStatement":
      return {
        ...stmt,
        condition: expr(stmt.condition),
        thenBlock: block(stmt.thenBlock),
        elifClauses: stmt.elifClauses.map((clause) => ({
          condition: expr(clause.condition),
          block: block(clause.block),
        })),
        elseBlock: stmt.elseBlock ? block(stmt.elseBlock) : undefined,
      };

    case "whileStatement":
      return { ...stmt, condition: expr(stmt.condition), body: block(stmt.body) };

    case "forStatement":
      return { ...stmt, iterable: expr(stmt.iterable), body: block(stmt.body) };

    case "matchStatement":
      return {
        ...stmt,
        scrutinee: expr(stmt.scrutinee),
        arms: stmt.arms.map((arm) => ({
          ...arm,
          guard: arm.guard ? expr(arm.guard) : undefined,
          body: block(arm.body),
        })),
      };

    case "withStatement":
      return { ...stmt, value: expr(stmt.value), body: block(stmt.body) };

    case "deferStatement":
    case "unsafeBlock":
      return { ...stmt, body: block(stmt.body) };

    case "breakStatement":
    case "continueStatement":
    case "passStatement":
      return stmt;

    default:
      return unhandledNode(stmt, "rewriteStatement");
  }
};

export const rewriteExpression = (
  expr: IrExpression,
  resolved: ResolvedCalls
): IrExpression => {
  const recurse = (e: IrExpression): IrExpression =>
    rewriteExpression(e, resolved);

  switch (expr.kind) {
    case "call": {
      const rebuilt: IrCallExpression = {
        ...expr,
        callee: recurse(expr.callee),
        compileTimeArguments: expr.compileTimeArguments.map(recurse),
        arguments: expr.arguments.map(recurse),
      };
      const specializedName = resolved.get(expr);
      return specializedName === undefined
        ? rebuilt
        : rewriteCallSite(rebuilt, specializedName);
    }

    case "binary":
      return { ...expr, left: recurse(expr.left), right: recurse(expr.right) };

    case "unary":
      return { ...expr, operand: recurse(expr.operand) };

    case "ternary":
      return {
        ...expr,
        whenTrue: recurse(expr.whenTrue),
        condition: recurse(expr.condition),
        whenFalse: recurse(expr.whenFalse),
      };

    case "cast":
    case "try":
      return { ...expr, expression: recurse(expr.expression) };

    case "methodCall":
      return {
        ...expr,
        object: recurse(expr.object),
        arguments: expr.arguments.map(recurse),
      };

    case "fieldAccess":
      return { ...expr, object: recurse(expr.object) };

    case "index":
      return { ...expr, object: recurse(expr.object), index: recurse(expr.index) };

    case "slice":
      return {
        ...expr,
        object: recurse(expr.object),
        start: expr.start ? recurse(expr.start) : undefined,
        end: expr.end ? recurse(expr.end) : undefined,
      };

    case "structLiteral":
      return {
        ...expr,
        fields: expr.fields.map((field) => ({
          name: field.name,
          value: recurse(field.value),
        })),
      };

    case "tupleLiteral":
    case "listLiteral":
      return { ...expr, elements: expr.elements.map(recurse) };

    case "closure":
      return { ...expr, body: rewriteCallSites(expr.body, resolved) };

    case "identifier":
    case "intLiteral":
    case "floatLiteral":
    case "stringLiteral":
    case "charLiteral":
    case "boolLiteral":
    case "noneLiteral":
      return expr;

    default:
      return unhandledNode(expr, "rewriteExpression");
  }
};

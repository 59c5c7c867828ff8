/**
 * Call collection from expressions
 */

import type { IrCallExpression, IrExpression } from "@cinder/frontend";
import { unhandledNode } from "../helpers.js";
import { collectFromBlock } from "./statements.js";

/**
 * Collect calls from an expression in pre-order, left to right
 */
export const collectFromExpression = (
  expr: IrExpression,
  calls: IrCallExpression[]
): void => {
  switch (expr.kind) {
    case "call":
      calls.push(expr);
      collectFromExpression(expr.callee, calls);
      for (const arg of expr.compileTimeArguments) {
        collectFromExpression(arg, calls);
      }
      for (const arg of expr.arguments) {
        collectFromExpression(arg, calls);
      }
      break;

    case "binary":
      collectFromExpression(expr.left, calls);
      collectFromExpression(expr.right, calls);
      break;

    case "unary":
      collectFromExpression(expr.operand, calls);
      break;

    // Source order: `whenTrue if condition else whenFalse`
    case "ternary":
      collectFromExpression(expr.whenTrue, calls);
      collectFromExpression(expr.condition, calls);
      collectFromExpression(expr.whenFalse, calls);
      break;

    case "cast":
    case "try":
      collectFromExpression(expr.expression, calls);
      break;

    case "methodCall":
      collectFromExpression(expr.object, calls);
      for (const arg of expr.arguments) {
        collectFromExpression(arg, calls);
      }
      break;

    case "fieldAccess":
      collectFromExpression(expr.object, calls);
      break;

    case "index":
      collectFromExpression(expr.object, calls);
      collectFromExpression(expr.index, calls);
      break;

    case "slice":
      collectFromExpression(expr.object, calls);
      if (expr.start) {
        collectFromExpression(expr.start, calls);
      }
      if (expr.end) {
        collectFromExpression(expr.end, calls);
      }
      break;

    case "structLiteral":
      for (const field of expr.fields) {
        collectFromExpression(field.value, calls);
      }
      break;

    case "tupleLiteral":
    case "listLiteral":
      for (const elem of expr.elements) {
        collectFromExpression(elem, calls);
      }
      break;

    case "closure":
      collectFromBlock(expr.body, calls);
      break;

    // Leaves
    case "identifier":
    case "intLiteral":
    case "floatLiteral":
    case "stringLiteral":
    case "charLiteral":
    case "boolLiteral":
    case "noneLiteral":
      break;

    default:
      unhandledNode(expr, "collectFromExpression");
  }
};

/**
 * Call collection from statements
 */

import type {
  IrBlock,
  IrCallExpression,
  IrStatement,
} from "@cinder/frontend";
import { unhandledNode } from "../helpers.js";
import { collectFromExpression } from "./expressions.js";

export const collectFromBlock = (
  block: IrBlock,
  calls: IrCallExpression[]
): void => {
  for (const stmt of block.statements) {
    collectFromStatement(stmt, calls);
  }
};

/**
 * Collect calls from a statement
 */
export const collectFromStatement = (
  stmt: IrStatement,
  calls: IrCallExpression[]
): void => {
  switch (stmt.kind) {
    case "variableDeclaration":
      collectFromExpression(stmt.initializer, calls);
      break;

    case "assignment":
      collectFromExpression(stmt.target, calls);
      collectFromExpression(stmt.value, calls);
      break;

    case "expressionStatement":
      collectFromExpression(stmt.expression, calls);
      break;

    case "returnStatement":
      if (stmt.expression) {
        collectFromExpression(stmt.expression, calls);
      }
      break;

    case "ifStatement":
      collectFromExpression(stmt.condition, calls);
      collectFromBlock(stmt.thenBlock, calls);
      for (const clause of stmt.elifClauses) {
        collectFromExpression(clause.condition, calls);
        collectFromBlock(clause.block, calls);
      }
      if (stmt.elseBlock) {
        collectFromBlock(stmt.elseBlock, calls);
      }
      break;

    case "whileStatement":
      collectFromExpression(stmt.condition, calls);
      collectFromBlock(stmt.body, calls);
      break;

    case "forStatement":
      collectFromExpression(stmt.iterable, calls);
      collectFromBlock(stmt.body, calls);
      break;

    case "matchStatement":
      collectFromExpression(stmt.scrutinee, calls);
      for (const arm of stmt.arms) {
        if (arm.guard) {
          collectFromExpression(arm.guard, calls);
        }
        collectFromBlock(arm.body, calls);
      }
      break;

    case "withStatement":
      collectFromExpression(stmt.value, calls);
      collectFromBlock(stmt.body, calls);
      break;

    case "deferStatement":
    case "unsafeBlock":
      collectFromBlock(stmt.body, calls);
      break;

    case "breakStatement":
    case "continueStatement":
    case "passStatement":
      break;

    default:
      unhandledNode(stmt, "collectFromStatement");
  }
};

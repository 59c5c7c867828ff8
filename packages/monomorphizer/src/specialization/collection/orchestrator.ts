/**
 * Main call collection entry point
 */

import type {
  IrBlock,
  IrCallExpression,
  IrExpression,
  IrItem,
  IrProgram,
  IrStatement,
} from "@cinder/frontend";
import { isStatement } from "@cinder/frontend";
import { collectFromBlock, collectFromStatement } from "./statements.js";
import { collectFromExpression } from "./expressions.js";

export type CollectableNode =
  | IrProgram
  | IrItem
  | IrBlock
  | IrStatement
  | IrExpression;

const collectFromItem = (item: IrItem, calls: IrCallExpression[]): void => {
  switch (item.kind) {
    case "functionDeclaration":
      collectFromBlock(item.body, calls);
      break;
    case "constDeclaration":
      collectFromExpression(item.value, calls);
      break;
    // Type-level declarations hold no calls
    case "structDeclaration":
    case "enumDeclaration":
    case "typeAliasDeclaration":
      break;
  }
};

/**
 * Collect every call expression reachable from a node, in source order.
 * Calls nested in other calls' arguments are included after their parent.
 */
export const collectCalls = (
  node: CollectableNode
): readonly IrCallExpression[] => {
  const calls: IrCallExpression[] = [];

  switch (node.kind) {
    case "program":
      for (const item of node.items) {
        collectFromItem(item, calls);
      }
      break;
    case "block":
      collectFromBlock(node, calls);
      break;
    case "functionDeclaration":
    case "constDeclaration":
    case "structDeclaration":
    case "enumDeclaration":
    case "typeAliasDeclaration":
      collectFromItem(node, calls);
      break;
    default:
      if (isStatement(node)) {
        collectFromStatement(node, calls);
      } else {
        collectFromExpression(node, calls);
      }
  }

  return calls;
};

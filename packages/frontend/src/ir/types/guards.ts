/**
 * Type guard helper functions
 */

import type { IrType, IrTypeArgument } from "./ir-types.js";
import type { IrExpression, IrLiteralExpression } from "./expressions.js";
import type { IrStatement } from "./statements.js";

const typeKinds: ReadonlySet<string> = new Set<IrType["kind"]>([
  "primitiveType",
  "referenceType",
  "pointerType",
  "arrayType",
  "sliceType",
  "genericType",
  "functionType",
  "tupleType",
]);

const literalKinds: ReadonlySet<string> = new Set<IrLiteralExpression["kind"]>(
  [
    "intLiteral",
    "floatLiteral",
    "stringLiteral",
    "charLiteral",
    "boolLiteral",
    "noneLiteral",
  ]
);

/**
 * True if a generic type slot holds a type rather than a value expression
 */
export const isType = (node: IrTypeArgument): node is IrType =>
  typeKinds.has(node.kind);

export const isLiteralExpression = (
  expr: IrExpression
): expr is IrLiteralExpression => literalKinds.has(expr.kind);

const statementKinds: ReadonlySet<string> = new Set<IrStatement["kind"]>([
  "variableDeclaration",
  "assignment",
  "expressionStatement",
  "returnStatement",
  "ifStatement",
  "whileStatement",
  "forStatement",
  "matchStatement",
  "deferStatement",
  "withStatement",
  "unsafeBlock",
  "breakStatement",
  "continueStatement",
  "passStatement",
]);

export const isStatement = (
  node: IrStatement | IrExpression
): node is IrStatement => statementKinds.has(node.kind);

/**
 * Statement types for IR
 */

import type { IrType } from "./ir-types.js";
import type { IrPattern } from "./helpers.js";
import type { IrExpression } from "./expressions.js";

export type IrStatement =
  | IrVariableDeclaration
  | IrAssignment
  | IrExpressionStatement
  | IrReturnStatement
  | IrIfStatement
  | IrWhileStatement
  | IrForStatement
  | IrMatchStatement
  | IrDeferStatement
  | IrWithStatement
  | IrUnsafeBlock
  | IrBreakStatement
  | IrContinueStatement
  | IrPassStatement;

export type IrBlock = {
  readonly kind: "block";
  readonly statements: readonly IrStatement[];
};

/** `let` / `var` binding */
export type IrVariableDeclaration = {
  readonly kind: "variableDeclaration";
  readonly pattern: IrPattern;
  readonly isMutable: boolean;
  readonly type?: IrType;
  readonly initializer: IrExpression;
};

export type IrAssignment = {
  readonly kind: "assignment";
  readonly target: IrExpression;
  readonly value: IrExpression;
};

export type IrExpressionStatement = {
  readonly kind: "expressionStatement";
  readonly expression: IrExpression;
};

export type IrReturnStatement = {
  readonly kind: "returnStatement";
  readonly expression?: IrExpression;
};

export type IrElifClause = {
  readonly condition: IrExpression;
  readonly block: IrBlock;
};

export type IrIfStatement = {
  readonly kind: "ifStatement";
  readonly condition: IrExpression;
  readonly thenBlock: IrBlock;
  readonly elifClauses: readonly IrElifClause[];
  readonly elseBlock?: IrBlock;
};

export type IrWhileStatement = {
  readonly kind: "whileStatement";
  readonly condition: IrExpression;
  readonly body: IrBlock;
};

/** `for variable in iterable:` */
export type IrForStatement = {
  readonly kind: "forStatement";
  readonly variable: string;
  readonly iterable: IrExpression;
  readonly body: IrBlock;
};

export type IrMatchArm = {
  readonly pattern: IrPattern;
  readonly guard?: IrExpression;
  readonly body: IrBlock;
};

export type IrMatchStatement = {
  readonly kind: "matchStatement";
  readonly scrutinee: IrExpression;
  readonly arms: readonly IrMatchArm[];
};

/** Block run on scope exit */
export type IrDeferStatement = {
  readonly kind: "deferStatement";
  readonly body: IrBlock;
};

/** `with variable = value:` scoped resource */
export type IrWithStatement = {
  readonly kind: "withStatement";
  readonly variable: string;
  readonly value: IrExpression;
  readonly body: IrBlock;
};

export type IrUnsafeBlock = {
  readonly kind: "unsafeBlock";
  readonly body: IrBlock;
};

export type IrBreakStatement = {
  readonly kind: "breakStatement";
};

export type IrContinueStatement = {
  readonly kind: "continueStatement";
};

export type IrPassStatement = {
  readonly kind: "passStatement";
};

/**
 * IR construction helpers for tests
 */

import type {
  IrBinaryOperator,
  IrBlock,
  IrCallExpression,
  IrComptimeParameter,
  IrComptimeValueKind,
  IrExpression,
  IrFunctionDeclaration,
  IrItem,
  IrParameter,
  IrProgram,
  IrStatement,
  IrType,
} from "@cinder/frontend";

export const int = (value: bigint | number): IrExpression => ({
  kind: "intLiteral",
  value: BigInt(value),
});

export const bool = (value: boolean): IrExpression => ({
  kind: "boolLiteral",
  value,
});

export const ident = (name: string): IrExpression => ({
  kind: "identifier",
  name,
});

export const binary = (
  operator: IrBinaryOperator,
  left: IrExpression,
  right: IrExpression
): IrExpression => ({ kind: "binary", operator, left, right });

export const call = (
  callee: string | IrExpression,
  compileTimeArguments: readonly IrExpression[] = [],
  args: readonly IrExpression[] = []
): IrCallExpression => ({
  kind: "call",
  callee: typeof callee === "string" ? ident(callee) : callee,
  compileTimeArguments,
  arguments: args,
});

export const block = (...statements: IrStatement[]): IrBlock => ({
  kind: "block",
  statements,
});

export const ret = (expression?: IrExpression): IrStatement => ({
  kind: "returnStatement",
  expression,
});

export const exprStmt = (expression: IrExpression): IrStatement => ({
  kind: "expressionStatement",
  expression,
});

export const letStmt = (
  name: string,
  initializer: IrExpression,
  type?: IrType
): IrStatement => ({
  kind: "variableDeclaration",
  pattern: { kind: "identifierPattern", name },
  isMutable: false,
  type,
  initializer,
});

export const named = (name: string): IrType => ({
  kind: "primitiveType",
  name,
});

export const param = (name: string, type: IrType): IrParameter => ({
  kind: "parameter",
  name,
  type,
});

type FunctionShape = {
  readonly comptime?: readonly (readonly [string, IrComptimeValueKind])[];
  readonly parameters?: readonly IrParameter[];
  readonly returnType?: IrType;
  readonly body?: readonly IrStatement[];
};

export const fn = (
  name: string,
  shape: FunctionShape = {}
): IrFunctionDeclaration => {
  const comptime: readonly (readonly [string, IrComptimeValueKind])[] =
    shape.comptime ?? [];
  const body: readonly IrStatement[] = shape.body ?? [];
  return {
    kind: "functionDeclaration",
    name,
    comptimeParameters: comptime.map(
      ([paramName, valueKind]): IrComptimeParameter => ({
        kind: "comptimeParameter",
        name: paramName,
        valueKind,
      })
    ),
    parameters: shape.parameters ?? [],
    returnType: shape.returnType,
    body: block(...body),
    isUnsafe: false,
    isExtern: false,
  };
};

export const program = (...items: IrItem[]): IrProgram => ({
  kind: "program",
  imports: [],
  items,
});

/**
 * First statement of a function body, failing loudly when absent
 */
export const firstStatement = (decl: IrFunctionDeclaration): IrStatement => {
  const stmt = decl.body.statements[0];
  if (!stmt) {
    throw new Error(`'${decl.name}' has an empty body`);
  }
  return stmt;
};

/**
 * Expression returned by the first statement of a function body
 */
export const returnedExpression = (
  decl: IrFunctionDeclaration
): IrExpression | undefined => {
  const stmt = firstStatement(decl);
  return stmt.kind === "returnStatement" ? stmt.expression : undefined;
};

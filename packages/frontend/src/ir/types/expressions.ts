/**
 * Expression types for IR
 */

import type { IrType } from "./ir-types.js";
import type {
  IrParameter,
  IrBinaryOperator,
  IrUnaryOperator,
} from "./helpers.js";
import type { IrBlock } from "./statements.js";
import type { SourceLocation } from "../../types/diagnostic.js";

export type IrExpression =
  | IrLiteralExpression
  | IrIdentifierExpression
  | IrBinaryExpression
  | IrUnaryExpression
  | IrTernaryExpression
  | IrCastExpression
  | IrCallExpression
  | IrMethodCallExpression
  | IrFieldAccessExpression
  | IrIndexExpression
  | IrSliceExpression
  | IrStructLiteralExpression
  | IrTupleLiteralExpression
  | IrListLiteralExpression
  | IrTryExpression
  | IrClosureExpression;

export type IrLiteralExpression =
  | IrIntLiteral
  | IrFloatLiteral
  | IrStringLiteral
  | IrCharLiteral
  | IrBoolLiteral
  | IrNoneLiteral;

/**
 * Integer literal. Values are signed 64-bit and held as bigint so that
 * `10` and `0xA` compare equal once the frontend has normalized them.
 */
export type IrIntLiteral = {
  readonly kind: "intLiteral";
  readonly value: bigint;
};

export type IrFloatLiteral = {
  readonly kind: "floatLiteral";
  readonly value: number;
};

export type IrStringLiteral = {
  readonly kind: "stringLiteral";
  readonly value: string;
};

export type IrCharLiteral = {
  readonly kind: "charLiteral";
  readonly value: string;
};

export type IrBoolLiteral = {
  readonly kind: "boolLiteral";
  readonly value: boolean;
};

export type IrNoneLiteral = {
  readonly kind: "noneLiteral";
};

export type IrIdentifierExpression = {
  readonly kind: "identifier";
  readonly name: string;
};

export type IrBinaryExpression = {
  readonly kind: "binary";
  readonly operator: IrBinaryOperator;
  readonly left: IrExpression;
  readonly right: IrExpression;
};

export type IrUnaryExpression = {
  readonly kind: "unary";
  readonly operator: IrUnaryOperator;
  readonly operand: IrExpression;
};

/**
 * `whenTrue if condition else whenFalse`
 */
export type IrTernaryExpression = {
  readonly kind: "ternary";
  readonly whenTrue: IrExpression;
  readonly condition: IrExpression;
  readonly whenFalse: IrExpression;
};

/** `expr as T` */
export type IrCastExpression = {
  readonly kind: "cast";
  readonly expression: IrExpression;
  readonly targetType: IrType;
};

/**
 * Function call `callee[compileTimeArguments](arguments)`.
 * After monomorphization `compileTimeArguments` is always empty.
 */
export type IrCallExpression = {
  readonly kind: "call";
  readonly callee: IrExpression;
  readonly compileTimeArguments: readonly IrExpression[];
  readonly arguments: readonly IrExpression[];
  readonly sourceSpan?: SourceLocation;
};

export type IrMethodCallExpression = {
  readonly kind: "methodCall";
  readonly object: IrExpression;
  readonly method: string;
  readonly arguments: readonly IrExpression[];
};

export type IrFieldAccessExpression = {
  readonly kind: "fieldAccess";
  readonly object: IrExpression;
  readonly field: string;
};

export type IrIndexExpression = {
  readonly kind: "index";
  readonly object: IrExpression;
  readonly index: IrExpression;
};

/** `object[start..end]`, either bound may be omitted */
export type IrSliceExpression = {
  readonly kind: "slice";
  readonly object: IrExpression;
  readonly start?: IrExpression;
  readonly end?: IrExpression;
};

export type IrStructLiteralField = {
  readonly name: string;
  readonly value: IrExpression;
};

export type IrStructLiteralExpression = {
  readonly kind: "structLiteral";
  readonly structName: string;
  readonly fields: readonly IrStructLiteralField[];
};

export type IrTupleLiteralExpression = {
  readonly kind: "tupleLiteral";
  readonly elements: readonly IrExpression[];
};

export type IrListLiteralExpression = {
  readonly kind: "listLiteral";
  readonly elements: readonly IrExpression[];
};

/** `expr?` */
export type IrTryExpression = {
  readonly kind: "try";
  readonly expression: IrExpression;
};

export type IrClosureExpression = {
  readonly kind: "closure";
  readonly parameters: readonly IrParameter[];
  readonly returnType?: IrType;
  readonly body: IrBlock;
  readonly isMove: boolean;
};

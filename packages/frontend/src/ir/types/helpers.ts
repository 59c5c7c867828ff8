/**
 * Supporting types (patterns, parameters, operators)
 */

import type { IrType } from "./ir-types.js";
import type { IrLiteralExpression } from "./expressions.js";

// ============================================================================
// Patterns (let bindings and match arms)
// ============================================================================

export type IrPattern =
  | IrIdentifierPattern
  | IrLiteralPattern
  | IrTuplePattern
  | IrWildcardPattern
  | IrEnumPattern
  | IrOrPattern;

export type IrIdentifierPattern = {
  readonly kind: "identifierPattern";
  readonly name: string;
};

export type IrLiteralPattern = {
  readonly kind: "literalPattern";
  readonly literal: IrLiteralExpression;
};

export type IrTuplePattern = {
  readonly kind: "tuplePattern";
  readonly elements: readonly IrPattern[];
};

export type IrWildcardPattern = {
  readonly kind: "wildcardPattern";
};

export type IrEnumPattern = {
  readonly kind: "enumPattern";
  /** Undefined for bare variant patterns like `Some(x)` */
  readonly enumName?: string;
  readonly variantName: string;
  readonly fields?: readonly IrPattern[];
};

export type IrOrPattern = {
  readonly kind: "orPattern";
  readonly patterns: readonly IrPattern[];
};

// ============================================================================
// Parameters
// ============================================================================

/**
 * Kinds of value a compile-time parameter may take
 */
export type IrComptimeValueKind = "int" | "bool";

/**
 * Compile-time parameter (`N: int` in `fn f[N: int]()`)
 */
export type IrComptimeParameter = {
  readonly kind: "comptimeParameter";
  readonly name: string;
  readonly valueKind: IrComptimeValueKind;
};

/**
 * Run-time parameter
 */
export type IrParameter = {
  readonly kind: "parameter";
  readonly name: string;
  readonly type: IrType;
};

// ============================================================================
// Operators
// ============================================================================

export type IrBinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "and"
  | "or"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>";

export type IrUnaryOperator = "-" | "not" | "~" | "&" | "&mut" | "*";

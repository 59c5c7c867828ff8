/**
 * Helper functions for specialization (keys, literal conversion)
 */

import type { IrExpression, IrLiteralExpression } from "@cinder/frontend";
import type { ComptimeValue } from "./types.js";

/**
 * Stable serialization of a compile-time value.
 * Tagged by kind so that `1` and `true` never share a key.
 */
export const serializeComptimeValue = (value: ComptimeValue): string =>
  typeof value === "bigint" ? `i:${value}` : `b:${value}`;

/**
 * Create a unique key for a specialization request
 */
export const createSpecializationKey = (
  name: string,
  args: readonly ComptimeValue[]
): string => `${name}[${args.map(serializeComptimeValue).join(",")}]`;

/**
 * Literal node carrying a compile-time value
 */
export const literalFromValue = (value: ComptimeValue): IrLiteralExpression =>
  typeof value === "bigint"
    ? { kind: "intLiteral", value }
    : { kind: "boolLiteral", value };

/**
 * Compile-time value of an expression, if it is an int or bool literal
 */
export const valueFromLiteral = (
  expr: IrExpression
): ComptimeValue | undefined => {
  switch (expr.kind) {
    case "intLiteral":
    case "boolLiteral":
      return expr.value;
    default:
      return undefined;
  }
};

/**
 * Exhaustiveness guard for switches over closed IR unions
 */
export const unhandledNode = (node: never, site: string): never => {
  throw new Error(`ICE: Unhandled IR node kind in ${site}: ${String(node)}`);
};

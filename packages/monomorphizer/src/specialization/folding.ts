/**
 * Constant folding of binary expressions whose operands are literals
 */

import type { IrBinaryExpression, IrExpression } from "@cinder/frontend";

/** Wrap to the signed 64-bit range, as the generated code does */
const wrap = (value: bigint): bigint => BigInt.asIntN(64, value);

const foldIntegers = (
  operator: IrBinaryExpression["operator"],
  left: bigint,
  right: bigint
): bigint | undefined => {
  switch (operator) {
    case "+":
      return wrap(left + right);
    case "-":
      return wrap(left - right);
    case "*":
      return wrap(left * right);
    // bigint division truncates toward zero and the remainder takes the
    // dividend's sign, matching signed machine division.
    case "/":
      return right === 0n ? undefined : wrap(left / right);
    case "%":
      return right === 0n ? undefined : wrap(left % right);
    default:
      return undefined;
  }
};

const foldBooleans = (
  operator: IrBinaryExpression["operator"],
  left: boolean,
  right: boolean
): boolean | undefined => {
  switch (operator) {
    case "and":
      return left && right;
    case "or":
      return left || right;
    default:
      return undefined;
  }
};

/**
 * Try to evaluate a binary expression at compile time.
 * Returns the original node when it cannot be folded.
 */
export const tryConstFold = (expr: IrBinaryExpression): IrExpression => {
  const { left, right } = expr;

  if (left.kind === "intLiteral" && right.kind === "intLiteral") {
    const value = foldIntegers(expr.operator, left.value, right.value);
    return value === undefined ? expr : { kind: "intLiteral", value };
  }

  if (left.kind === "boolLiteral" && right.kind === "boolLiteral") {
    const value = foldBooleans(expr.operator, left.value, right.value);
    return value === undefined ? expr : { kind: "boolLiteral", value };
  }

  return expr;
};

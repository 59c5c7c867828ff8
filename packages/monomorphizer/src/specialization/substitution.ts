/**
 * Compile-time parameter substitution for specialization
 *
 * Every walker returns new nodes and leaves its input untouched, except that
 * identifiers which are not substituted are returned as the same node.
 */

import type {
  IrBlock,
  IrExpression,
  IrStatement,
  IrType,
} from "@cinder/frontend";
import { isType } from "@cinder/frontend";
import type { ComptimeValue } from "./types.js";
import { literalFromValue, unhandledNode } from "./helpers.js";
import { tryConstFold } from "./folding.js";

/**
 * Values bound to compile-time parameter names, plus folding policy
 */
export type Substitutions = {
  readonly values: ReadonlyMap<string, ComptimeValue>;
  readonly foldConstants: boolean;
};

export const createSubstitutions = (
  values: ReadonlyMap<string, ComptimeValue>,
  foldConstants = true
): Substitutions => ({ values, foldConstants });

/**
 * Substitutions for a scope whose bindings shadow `names`
 */
const withoutNames = (
  substitutions: Substitutions,
  names: readonly string[]
): Substitutions => {
  if (!names.some((name) => substitutions.values.has(name))) {
    return substitutions;
  }
  const values = new Map(substitutions.values);
  for (const name of names) {
    values.delete(name);
  }
  return { ...substitutions, values };
};

/**
 * Substitute compile-time parameters in a block
 */
export const substituteBlock = (
  block: IrBlock,
  substitutions: Substitutions
): IrBlock => ({
  ...block,
  statements: block.statements.map((stmt) =>
    substituteStatement(stmt, substitutions)
  ),
});

/**
 * Substitute compile-time parameters in a statement
 */
export const substituteStatement = (
  stmt: IrStatement,
  substitutions: Substitutions
): IrStatement => {
  switch (stmt.kind) {
    case "variableDeclaration":
      return {
        ...stmt,
        type: stmt.type ? substituteType(stmt.type, substitutions) : undefined,
        initializer: substituteExpression(stmt.initializer, substitutions),
      };

    case "assignment":
      return {
        ...stmt,
        target: substituteExpression(stmt.target, substitutions),
        value: substituteExpression(stmt.value, substitutions),
      };

    case "expressionStatement":
      return {
        ...stmt,
        expression: substituteExpression(stmt.expression, substitutions),
      };

    case "returnStatement":
      return {
        ...stmt,
        expression: stmt.expression
          ? substituteExpression(stmt.expression, substitutions)
          : undefined,
      };

    case "ifStatement":
      return {
        ...stmt,
        condition: substituteExpression(stmt.condition, substitutions),
        thenBlock: substituteBlock(stmt.thenBlock, substitutions),
        elifClauses: stmt.elifClauses.map((clause) => ({
          condition: substituteExpression(clause.condition, substitutions),
          block: substituteBlock(clause.block, substitutions),
        })),
        elseBlock: stmt.elseBlock
          ? substituteBlock(stmt.elseBlock, substitutions)
          : undefined,
      };

    case "whileStatement":
      return {
        ...stmt,
        condition: substituteExpression(stmt.condition, substitutions),
        body: substituteBlock(stmt.body, substitutions),
      };

    case "forStatement":
      // The loop variable is a binding, never a use
      return {
        ...stmt,
        iterable: substituteExpression(stmt.iterable, substitutions),
        body: substituteBlock(stmt.body, substitutions),
      };

    case "matchStatement":
      return {
        ...stmt,
        scrutinee: substituteExpression(stmt.scrutinee, substitutions),
        arms: stmt.arms.map((arm) => ({
          ...arm,
          guard: arm.guard
            ? substituteExpression(arm.guard, substitutions)
            : undefined,
          body: substituteBlock(arm.body, substitutions),
        })),
      };

    case "withStatement":
      return {
        ...stmt,
        value: substituteExpression(stmt.value, substitutions),
        body: substituteBlock(stmt.body, substitutions),
      };

    case "deferStatement":
    case "unsafeBlock":
      return {
        ...stmt,
        body: substituteBlock(stmt.body, substitutions),
      };

    case "breakStatement":
    case "continueStatement":
    case "passStatement":
      return stmt;

    default:
      return unhandledNode(stmt, "substituteStatement");
  }
};

/**
 * Substitute compile-time parameters in an expression
 */
export const substituteExpression = (
  expr: IrExpression,
  substitutions: Substitutions
): IrExpression => {
  const recurse = (e: IrExpression): IrExpression =>
    substituteExpression(e, substitutions);

  switch (expr.kind) {
    case "identifier": {
      const value = substitutions.values.get(expr.name);
      return value === undefined ? expr : literalFromValue(value);
    }

    case "binary": {
      const substituted = {
        ...expr,
        left: recurse(expr.left),
        right: recurse(expr.right),
      };
      return substitutions.foldConstants
        ? tryConstFold(substituted)
        : substituted;
    }

    // Unary results are not folded
    case "unary":
      return { ...expr, operand: recurse(expr.operand) };

    case "ternary":
      return {
        ...expr,
        condition: recurse(expr.condition),
        whenTrue: recurse(expr.whenTrue),
        whenFalse: recurse(expr.whenFalse),
      };

    case "cast":
      return {
        ...expr,
        expression: recurse(expr.expression),
        targetType: substituteType(expr.targetType, substitutions),
      };

    case "call":
      return {
        ...expr,
        callee: recurse(expr.callee),
        compileTimeArguments: expr.compileTimeArguments.map(recurse),
        arguments: expr.arguments.map(recurse),
      };

    case "methodCall":
      return {
        ...expr,
        object: recurse(expr.object),
        arguments: expr.arguments.map(recurse),
      };

    case "fieldAccess":
      return { ...expr, object: recurse(expr.object) };

    case "index":
      return {
        ...expr,
        object: recurse(expr.object),
        index: recurse(expr.index),
      };

    case "slice":
      return {
        ...expr,
        object: recurse(expr.object),
        start: expr.start ? recurse(expr.start) : undefined,
        end: expr.end ? recurse(expr.end) : undefined,
      };

    case "structLiteral":
      return {
        ...expr,
        fields: expr.fields.map((field) => ({
          name: field.name,
          value: recurse(field.value),
        })),
      };

    case "tupleLiteral":
    case "listLiteral":
      return { ...expr, elements: expr.elements.map(recurse) };

    case "try":
      return { ...expr, expression: recurse(expr.expression) };

    case "closure":
      return {
        ...expr,
        parameters: expr.parameters.map((param) => ({
          ...param,
          type: substituteType(param.type, substitutions),
        })),
        returnType: expr.returnType
          ? substituteType(expr.returnType, substitutions)
          : undefined,
        body: substituteBlock(
          expr.body,
          withoutNames(
            substitutions,
            expr.parameters.map((param) => param.name)
          )
        ),
      };

    case "intLiteral":
    case "floatLiteral":
    case "stringLiteral":
    case "charLiteral":
    case "boolLiteral":
    case "noneLiteral":
      return expr;

    default:
      return unhandledNode(expr, "substituteExpression");
  }
};

/**
 * Substitute compile-time parameters in a type annotation
 */
export const substituteType = (
  type: IrType,
  substitutions: Substitutions
): IrType => {
  switch (type.kind) {
    // [T; N] where N may be a compile-time parameter
    case "arrayType":
      return {
        ...type,
        elementType: type.elementType
          ? substituteType(type.elementType, substitutions)
          : undefined,
        size: type.size
          ? substituteExpression(type.size, substitutions)
          : undefined,
      };

    // Matrix[Rows, Cols]: value slots are expressions, type slots are types
    case "genericType":
      return {
        ...type,
        typeArguments: type.typeArguments.map((arg) =>
          isType(arg)
            ? substituteType(arg, substitutions)
            : substituteExpression(arg, substitutions)
        ),
      };

    case "referenceType":
    case "pointerType":
      return { ...type, inner: substituteType(type.inner, substitutions) };

    case "sliceType":
      return {
        ...type,
        elementType: substituteType(type.elementType, substitutions),
      };

    case "functionType":
      return {
        ...type,
        parameterTypes: type.parameterTypes.map((t) =>
          substituteType(t, substitutions)
        ),
        returnType: type.returnType
          ? substituteType(type.returnType, substitutions)
          : undefined,
      };

    case "tupleType":
      return {
        ...type,
        elementTypes: type.elementTypes.map((t) =>
          substituteType(t, substitutions)
        ),
      };

    case "primitiveType":
      return type;

    default:
      return unhandledNode(type, "substituteType");
  }
};

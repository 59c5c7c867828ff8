/**
 * IR types barrel exports
 */

// Program types
export type {
  IrProgram,
  IrImport,
  IrItem,
  IrFunctionDeclaration,
  IrStructDeclaration,
  IrStructField,
  IrEnumDeclaration,
  IrEnumVariant,
  IrConstDeclaration,
  IrTypeAliasDeclaration,
} from "./program.js";

// Statement types
export type {
  IrStatement,
  IrBlock,
  IrVariableDeclaration,
  IrAssignment,
  IrExpressionStatement,
  IrReturnStatement,
  IrIfStatement,
  IrElifClause,
  IrWhileStatement,
  IrForStatement,
  IrMatchStatement,
  IrMatchArm,
  IrDeferStatement,
  IrWithStatement,
  IrUnsafeBlock,
  IrBreakStatement,
  IrContinueStatement,
  IrPassStatement,
} from "./statements.js";

// Expression types
export type {
  IrExpression,
  IrLiteralExpression,
  IrIntLiteral,
  IrFloatLiteral,
  IrStringLiteral,
  IrCharLiteral,
  IrBoolLiteral,
  IrNoneLiteral,
  IrIdentifierExpression,
  IrBinaryExpression,
  IrUnaryExpression,
  IrTernaryExpression,
  IrCastExpression,
  IrCallExpression,
  IrMethodCallExpression,
  IrFieldAccessExpression,
  IrIndexExpression,
  IrSliceExpression,
  IrStructLiteralExpression,
  IrStructLiteralField,
  IrTupleLiteralExpression,
  IrListLiteralExpression,
  IrTryExpression,
  IrClosureExpression,
} from "./expressions.js";

// Type annotation types
export type {
  IrType,
  IrTypeArgument,
  IrPrimitiveType,
  IrReferenceType,
  IrPointerType,
  IrArrayType,
  IrSliceType,
  IrGenericType,
  IrFunctionType,
  IrTupleType,
} from "./ir-types.js";

// Helper types
export type {
  IrPattern,
  IrIdentifierPattern,
  IrLiteralPattern,
  IrTuplePattern,
  IrWildcardPattern,
  IrEnumPattern,
  IrOrPattern,
  IrComptimeValueKind,
  IrComptimeParameter,
  IrParameter,
  IrBinaryOperator,
  IrUnaryOperator,
} from "./helpers.js";

// Type guards
export { isType, isLiteralExpression, isStatement } from "./guards.js";

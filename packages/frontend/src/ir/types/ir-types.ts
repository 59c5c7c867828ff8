/**
 * Type annotation nodes for IR (IrType and its variants)
 */

import type { IrExpression } from "./expressions.js";

export type IrType =
  | IrPrimitiveType
  | IrReferenceType
  | IrPointerType
  | IrArrayType
  | IrSliceType
  | IrGenericType
  | IrFunctionType
  | IrTupleType;

/**
 * Named type (`int`, `bool`, `String`, a struct name, ...)
 */
export type IrPrimitiveType = {
  readonly kind: "primitiveType";
  readonly name: string;
};

/** `&T` / `&mut T` */
export type IrReferenceType = {
  readonly kind: "referenceType";
  readonly isMutable: boolean;
  readonly inner: IrType;
};

/** `*T` / `*mut T` */
export type IrPointerType = {
  readonly kind: "pointerType";
  readonly isMutable: boolean;
  readonly inner: IrType;
};

/**
 * Fixed-size array `[T; N]`.
 *
 * The size is an expression so that it can name a compile-time parameter
 * before specialization. Both fields are optional because partially-inferred
 * array types reach this stage from the frontend.
 */
export type IrArrayType = {
  readonly kind: "arrayType";
  readonly elementType?: IrType;
  readonly size?: IrExpression;
};

/** `&[T]` */
export type IrSliceType = {
  readonly kind: "sliceType";
  readonly elementType: IrType;
};

/**
 * Parameterized type (`List[T]`, `Matrix[Rows, Cols]`).
 * A slot holds either a true type argument or a value expression.
 */
export type IrGenericType = {
  readonly kind: "genericType";
  readonly name: string;
  readonly typeArguments: readonly IrTypeArgument[];
};

export type IrTypeArgument = IrType | IrExpression;

export type IrFunctionType = {
  readonly kind: "functionType";
  readonly parameterTypes: readonly IrType[];
  readonly returnType?: IrType;
};

export type IrTupleType = {
  readonly kind: "tupleType";
  readonly elementTypes: readonly IrType[];
};

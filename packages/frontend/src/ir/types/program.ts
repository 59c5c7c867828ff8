/**
 * Program and top-level item types for IR
 */

import type { IrType } from "./ir-types.js";
import type { IrComptimeParameter, IrParameter } from "./helpers.js";
import type { IrExpression } from "./expressions.js";
import type { IrBlock } from "./statements.js";
import type { SourceLocation } from "../../types/diagnostic.js";

export type IrProgram = {
  readonly kind: "program";
  readonly imports: readonly IrImport[];
  readonly items: readonly IrItem[];
};

export type IrImport = {
  readonly kind: "import";
  /** Module path segments, e.g. `["std", "collections"]` */
  readonly path: readonly string[];
  readonly alias?: string;
};

export type IrItem =
  | IrFunctionDeclaration
  | IrStructDeclaration
  | IrEnumDeclaration
  | IrConstDeclaration
  | IrTypeAliasDeclaration;

/**
 * Function declaration.
 *
 * A function with a non-empty `comptimeParameters` list is generic over
 * compile-time values and is replaced by its specializations during
 * monomorphization. Names are not unique once specializations exist.
 */
export type IrFunctionDeclaration = {
  readonly kind: "functionDeclaration";
  readonly name: string;
  readonly comptimeParameters: readonly IrComptimeParameter[];
  readonly parameters: readonly IrParameter[];
  readonly returnType?: IrType;
  readonly body: IrBlock;
  readonly isUnsafe: boolean;
  readonly isExtern: boolean;
  readonly sourceSpan?: SourceLocation;
};

export type IrStructField = {
  readonly name: string;
  readonly type: IrType;
};

export type IrStructDeclaration = {
  readonly kind: "structDeclaration";
  readonly name: string;
  readonly fields: readonly IrStructField[];
};

export type IrEnumVariant = {
  readonly name: string;
  /** Undefined for unit variants */
  readonly fields?: readonly IrStructField[];
};

export type IrEnumDeclaration = {
  readonly kind: "enumDeclaration";
  readonly name: string;
  readonly variants: readonly IrEnumVariant[];
};

export type IrConstDeclaration = {
  readonly kind: "constDeclaration";
  readonly name: string;
  readonly type?: IrType;
  readonly value: IrExpression;
};

export type IrTypeAliasDeclaration = {
  readonly kind: "typeAliasDeclaration";
  readonly name: string;
  readonly target: IrType;
};

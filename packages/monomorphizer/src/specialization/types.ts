/**
 * Type definitions for the specialization system
 */

import type { IrFunctionDeclaration } from "@cinder/frontend";

/**
 * Value bound to a compile-time parameter at a call site.
 * Integers are signed 64-bit.
 */
export type ComptimeValue = bigint | boolean;

/**
 * Options for a monomorphization run
 */
export type MonomorphizeOptions = {
  /** Log created specializations and skipped calls */
  readonly verbose?: boolean;
  /** Fold literal-only binary expressions after substitution (default: true) */
  readonly foldConstants?: boolean;
  /** Maximum number of specializations one run may create (default: 4096) */
  readonly maxSpecializations?: number;
};

/**
 * Specialization state for one compilation.
 *
 * The maps are mutated as functions are registered and specialized; a
 * context must not be shared between overlapping compilations.
 */
export type SpecializationContext = {
  readonly options: MonomorphizeOptions;
  /** Generic declarations by name. The first registration wins. */
  readonly originalFunctions: Map<string, IrFunctionDeclaration>;
  /** Specialized declarations by specialization key */
  readonly cache: Map<string, IrFunctionDeclaration>;
  /** Specialization keys in creation order */
  readonly creationOrder: string[];
};

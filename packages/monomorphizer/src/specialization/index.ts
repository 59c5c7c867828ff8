/**
 * Specialization system barrel exports
 */

// Types
export type {
  ComptimeValue,
  MonomorphizeOptions,
  SpecializationContext,
} from "./types.js";

// Context and generation
export {
  createSpecializationContext,
  needsSpecialization,
  registerOriginalFunction,
  isSpecialized,
  specializeFunction,
  getSpecializations,
  replaceSpecialization,
} from "./generation.js";

// Naming
export { getSpecializedFunctionName } from "./naming.js";

// Helpers
export {
  createSpecializationKey,
  serializeComptimeValue,
  literalFromValue,
  valueFromLiteral,
} from "./helpers.js";

// Substitution
export {
  type Substitutions,
  createSubstitutions,
  substituteBlock,
  substituteStatement,
  substituteExpression,
  substituteType,
} from "./substitution.js";

// Folding
export { tryConstFold } from "./folding.js";

// Collection
export { collectCalls, type CollectableNode } from "./collection/index.js";

// Call-site rewriting
export {
  type ResolvedCalls,
  getCalleeName,
  shouldRewriteCall,
  rewriteCallSite,
  rewriteCallSites,
  rewriteStatement,
  rewriteExpression,
} from "./call-site-rewriting.js";

// Extraction
export { extractCompileTimeArgs } from "./extraction.js";

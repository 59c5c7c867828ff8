/**
 * Cinder Monomorphizer - compile-time parameter specialization
 */

export * from "./specialization/index.js";
export {
  monomorphizeProgram,
  DEFAULT_MAX_SPECIALIZATIONS,
  type MonomorphizeResult,
} from "./monomorphize.js";

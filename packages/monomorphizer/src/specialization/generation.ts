/**
 * Specialization context: registry, cache and specialized declarations
 */

import type { IrFunctionDeclaration } from "@cinder/frontend";
import type {
  ComptimeValue,
  MonomorphizeOptions,
  SpecializationContext,
} from "./types.js";
import { createSpecializationKey } from "./helpers.js";
import { getSpecializedFunctionName } from "./naming.js";
import {
  createSubstitutions,
  substituteBlock,
  substituteType,
} from "./substitution.js";

/**
 * Create a fresh context. Use one per compilation.
 */
export const createSpecializationContext = (
  options: MonomorphizeOptions = {}
): SpecializationContext => ({
  options,
  originalFunctions: new Map(),
  cache: new Map(),
  creationOrder: [],
});

export const needsSpecialization = (decl: IrFunctionDeclaration): boolean =>
  decl.comptimeParameters.length > 0;

/**
 * Store an original (generic) declaration.
 * A second registration under the same name is ignored.
 */
export const registerOriginalFunction = (
  context: SpecializationContext,
  decl: IrFunctionDeclaration
): void => {
  if (!context.originalFunctions.has(decl.name)) {
    context.originalFunctions.set(decl.name, decl);
  }
};

export const isSpecialized = (
  context: SpecializationContext,
  name: string,
  args: readonly ComptimeValue[]
): boolean => context.cache.has(createSpecializationKey(name, args));

/**
 * Get or create the specialization of `decl` for `args`.
 *
 * Repeated requests for the same name and argument values return the same
 * declaration object.
 */
export const specializeFunction = (
  context: SpecializationContext,
  decl: IrFunctionDeclaration,
  args: readonly ComptimeValue[]
): IrFunctionDeclaration => {
  const key = createSpecializationKey(decl.name, args);
  const cached = context.cache.get(key);
  if (cached) {
    return cached;
  }

  const values = new Map<string, ComptimeValue>();
  decl.comptimeParameters.forEach((param, index) => {
    const arg = args[index];
    if (arg !== undefined) {
      values.set(param.name, arg);
    }
  });
  const substitutions = createSubstitutions(
    values,
    context.options.foldConstants ?? true
  );

  const specialized: IrFunctionDeclaration = {
    ...decl,
    name: getSpecializedFunctionName(decl.name, args),
    comptimeParameters: [],
    parameters: decl.parameters.map((param) => ({
      ...param,
      type: substituteType(param.type, substitutions),
    })),
    returnType: decl.returnType
      ? substituteType(decl.returnType, substitutions)
      : undefined,
    body: substituteBlock(decl.body, substitutions),
  };

  context.cache.set(key, specialized);
  context.creationOrder.push(key);

  if (context.options.verbose) {
    console.log(`[Cinder] Specialized '${decl.name}' as '${specialized.name}'`);
  }

  return specialized;
};

/**
 * Every specialization created so far, in creation order
 */
export const getSpecializations = (
  context: SpecializationContext
): readonly IrFunctionDeclaration[] =>
  context.creationOrder.flatMap((key) => {
    const decl = context.cache.get(key);
    return decl ? [decl] : [];
  });

/**
 * Replace the canonical declaration stored under a key, so that later
 * lookups return the updated node.
 */
export const replaceSpecialization = (
  context: SpecializationContext,
  key: string,
  decl: IrFunctionDeclaration
): void => {
  if (!context.cache.has(key)) {
    throw new Error(`ICE: No specialization stored under '${key}'`);
  }
  context.cache.set(key, decl);
};

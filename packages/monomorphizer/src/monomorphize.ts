/**
 * Whole-program monomorphization driver
 *
 * 1. Register every top-level function with compile-time parameters
 * 2. Collect calls from the bodies of top-level items; inside generic
 *    functions only calls whose compile-time arguments are already literals
 * 3. Specialize each call to a registered function and record the rewrite
 * 4. Rewrite recorded calls, then repeat 2-4 on each new specialization
 * 5. Emit non-generic items followed by specializations in creation order
 */

import type {
  Diagnostic,
  DiagnosticsCollector,
  IrBlock,
  IrCallExpression,
  IrFunctionDeclaration,
  IrItem,
  IrProgram,
  Result,
} from "@cinder/frontend";
import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  error,
  formatDiagnostic,
  ok,
} from "@cinder/frontend";
import type {
  MonomorphizeOptions,
  SpecializationContext,
} from "./specialization/types.js";
import {
  createSpecializationContext,
  getSpecializations,
  isSpecialized,
  needsSpecialization,
  registerOriginalFunction,
  replaceSpecialization,
  specializeFunction,
} from "./specialization/generation.js";
import { collectCalls } from "./specialization/collection/index.js";
import {
  getCalleeName,
  rewriteCallSites,
  rewriteExpression,
  shouldRewriteCall,
} from "./specialization/call-site-rewriting.js";
import { extractCompileTimeArgs } from "./specialization/extraction.js";
import { valueFromLiteral } from "./specialization/helpers.js";

export const DEFAULT_MAX_SPECIALIZATIONS = 4096;

export type MonomorphizeResult = {
  readonly program: IrProgram;
  /** Specializations in creation order (also the tail of `program.items`) */
  readonly specializations: readonly IrFunctionDeclaration[];
  /** Warnings about calls that were left untouched */
  readonly diagnostics: readonly Diagnostic[];
};

type Resolution = {
  readonly resolved: ReadonlyMap<IrCallExpression, string>;
  readonly collector: DiagnosticsCollector;
};

const report = (
  context: SpecializationContext,
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => {
  if (context.options.verbose) {
    console.warn(`[Cinder] ${formatDiagnostic(diagnostic)}`);
  }
  return addDiagnostic(collector, diagnostic);
};

/**
 * Specialize every call in `calls` that targets a registered function.
 * Stops at the first error; warnings accumulate in the collector.
 */
const resolveCalls = (
  context: SpecializationContext,
  calls: readonly IrCallExpression[],
  initial: DiagnosticsCollector
): Result<Resolution, DiagnosticsCollector> => {
  const resolved = new Map<IrCallExpression, string>();
  const limit =
    context.options.maxSpecializations ?? DEFAULT_MAX_SPECIALIZATIONS;
  let collector = initial;

  for (const call of calls) {
    if (call.compileTimeArguments.length === 0) {
      continue;
    }

    const name = getCalleeName(call);
    if (name === undefined) {
      collector = report(
        context,
        collector,
        createDiagnostic(
          "CDR3002",
          "warning",
          `Compile-time arguments on a '${call.callee.kind}' callee are not specialized`,
          call.sourceSpan
        )
      );
      continue;
    }

    const original = context.originalFunctions.get(name);
    if (!original) {
      collector = report(
        context,
        collector,
        createDiagnostic(
          "CDR3003",
          "warning",
          `'${name}' has no compile-time parameters; call left unchanged`,
          call.sourceSpan
        )
      );
      continue;
    }

    const argsResult = extractCompileTimeArgs(call);
    if (!argsResult.ok) {
      return error(addDiagnostic(collector, argsResult.error));
    }
    const args = argsResult.value;

    if (args.length !== original.comptimeParameters.length) {
      return error(
        addDiagnostic(
          collector,
          createDiagnostic(
            "CDR3004",
            "error",
            `'${name}' expects ${original.comptimeParameters.length} compile-time argument(s), got ${args.length}`,
            call.sourceSpan
          )
        )
      );
    }

    if (
      !isSpecialized(context, name, args) &&
      context.creationOrder.length >= limit
    ) {
      return error(
        addDiagnostic(
          collector,
          createDiagnostic(
            "CDR3005",
            "error",
            `Specialization limit of ${limit} reached while specializing '${name}'`,
            call.sourceSpan,
            "Check for compile-time recursion that never terminates"
          )
        )
      );
    }

    resolved.set(call, specializeFunction(context, original, args).name);
  }

  return ok({ resolved, collector });
};

const rewriteBody = (
  body: IrBlock,
  resolved: ReadonlyMap<IrCallExpression, string>
): IrBlock => (resolved.size === 0 ? body : rewriteCallSites(body, resolved));

/**
 * Calls in a generic body that can be specialized before substitution.
 * Arguments that mention compile-time parameters wait for the worklist.
 */
const collectLiteralCalls = (
  context: SpecializationContext,
  decl: IrFunctionDeclaration
): readonly IrCallExpression[] =>
  collectCalls(decl.body).filter(
    (call) =>
      shouldRewriteCall(context, call) &&
      call.compileTimeArguments.every(
        (arg) => valueFromLiteral(arg) !== undefined
      )
  );

/**
 * Resolve and rewrite the calls of one non-generic item
 */
const processItem = (
  context: SpecializationContext,
  item: IrItem,
  collector: DiagnosticsCollector
): Result<
  { readonly item: IrItem; readonly collector: DiagnosticsCollector },
  DiagnosticsCollector
> => {
  switch (item.kind) {
    case "functionDeclaration": {
      const result = resolveCalls(context, collectCalls(item.body), collector);
      if (!result.ok) {
        return result;
      }
      const { resolved } = result.value;
      return ok({
        item:
          resolved.size === 0
            ? item
            : { ...item, body: rewriteBody(item.body, resolved) },
        collector: result.value.collector,
      });
    }

    case "constDeclaration": {
      const result = resolveCalls(context, collectCalls(item.value), collector);
      if (!result.ok) {
        return result;
      }
      const { resolved } = result.value;
      return ok({
        item:
          resolved.size === 0
            ? item
            : { ...item, value: rewriteExpression(item.value, resolved) },
        collector: result.value.collector,
      });
    }

    case "structDeclaration":
    case "enumDeclaration":
    case "typeAliasDeclaration":
      return ok({ item, collector });
  }
};

/**
 * Monomorphize a program.
 *
 * Returns a new program in which no function has compile-time parameters
 * and no call carries compile-time arguments to a specialized function.
 * The input program is not modified. Any error aborts the whole run.
 */
export const monomorphizeProgram = (
  program: IrProgram,
  options: MonomorphizeOptions = {}
): Result<MonomorphizeResult, DiagnosticsCollector> => {
  const context = createSpecializationContext(options);

  for (const item of program.items) {
    if (item.kind === "functionDeclaration" && needsSpecialization(item)) {
      registerOriginalFunction(context, item);
    }
  }

  let collector = createDiagnosticsCollector();
  const items: IrItem[] = [];

  for (const item of program.items) {
    if (item.kind === "functionDeclaration" && needsSpecialization(item)) {
      // Replaced by its specializations
      const result = resolveCalls(
        context,
        collectLiteralCalls(context, item),
        collector
      );
      if (!result.ok) {
        return result;
      }
      collector = result.value.collector;
      continue;
    }
    const result = processItem(context, item, collector);
    if (!result.ok) {
      return result;
    }
    items.push(result.value.item);
    collector = result.value.collector;
  }

  // Specializations may call other generic functions with arguments that
  // only became literals after substitution. The order grows while we walk it.
  for (let index = 0; index < context.creationOrder.length; index++) {
    const key = context.creationOrder[index];
    const decl = key === undefined ? undefined : context.cache.get(key);
    if (key === undefined || decl === undefined) {
      throw new Error(`ICE: Specialization #${index} missing from cache`);
    }

    const result = resolveCalls(context, collectCalls(decl.body), collector);
    if (!result.ok) {
      return result;
    }
    collector = result.value.collector;

    const { resolved } = result.value;
    if (resolved.size > 0) {
      replaceSpecialization(context, key, {
        ...decl,
        body: rewriteBody(decl.body, resolved),
      });
    }
  }

  const specializations = getSpecializations(context);

  return ok({
    program: { ...program, items: [...items, ...specializations] },
    specializations,
    diagnostics: collector.diagnostics,
  });
};

/**
 * Compile-time argument extraction
 */

import type { Diagnostic, IrCallExpression, Result } from "@cinder/frontend";
import { createDiagnostic, error, ok, sequence } from "@cinder/frontend";
import type { ComptimeValue } from "./types.js";
import { valueFromLiteral } from "./helpers.js";

const describeCallee = (call: IrCallExpression): string =>
  call.callee.kind === "identifier"
    ? `'${call.callee.name}'`
    : `<${call.callee.kind}>`;

/**
 * Read the literal values of a call's compile-time arguments.
 *
 * Arguments are never evaluated here: anything other than an int or bool
 * literal is rejected with CDR3001.
 */
export const extractCompileTimeArgs = (
  call: IrCallExpression
): Result<readonly ComptimeValue[], Diagnostic> =>
  sequence(
    call.compileTimeArguments.map((arg, index) => {
      const value = valueFromLiteral(arg);
      return value === undefined
        ? error<ComptimeValue, Diagnostic>(
            createDiagnostic(
              "CDR3001",
              "error",
              `Compile-time argument ${index + 1} in call to ${describeCallee(call)} must be an integer or boolean literal, got '${arg.kind}'`,
              call.sourceSpan,
              "Compile-time arguments must be known without evaluation"
            )
          )
        : ok<ComptimeValue, Diagnostic>(value);
    })
  );

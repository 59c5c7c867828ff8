/**
 * Name generation for specialized declarations
 */

import type { ComptimeValue } from "./types.js";

const formatSegment = (value: ComptimeValue): string => {
  if (typeof value === "bigint") {
    return value < 0n ? `neg${-value}` : `${value}`;
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  // Unreachable for checked input. Every non-alphanumeric character,
  // underscore included, becomes `_<hex code point>_`.
  return String(value).replace(
    /[^A-Za-z0-9]/gu,
    (ch) => `_${(ch.codePointAt(0) ?? 0).toString(16)}_`
  );
};

/**
 * Generate specialized function name.
 *
 * `process[256, true]` becomes `process_256_true`, `offset[-10]` becomes
 * `offset_neg10`. Without arguments the base name is returned unchanged.
 */
export const getSpecializedFunctionName = (
  baseName: string,
  args: readonly ComptimeValue[]
): string => {
  if (args.length === 0) {
    return baseName;
  }
  return `${baseName}_${args.map(formatSegment).join("_")}`;
};

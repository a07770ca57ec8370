/**
 * XOR simplifier.
 */

import type { BitExpr } from "../ir/bit.js";
import { eliminate } from "./eliminate.js";
import { flatten } from "./flatten.js";

export { flatten, flattenOperands } from "./flatten.js";
export { eliminate, type EliminateOptions } from "./eliminate.js";

/**
 * Optimizer step flags. Any sum of FLATTEN, ELIMINATE and LEX is valid.
 */
export const Optimize = {
  NONE: 0,
  /** Flatten the bit operation tree. */
  FLATTEN: 1 << 0,
  /** Eliminate redundant operations. */
  ELIMINATE: 1 << 1,
  /** Sort the operands in lexicographical order where possible. */
  LEX: 1 << 2,
  ALL: (1 << 0) | (1 << 1) | (1 << 2),
} as const;

/**
 * Applies the enabled simplifier steps to one bit expression.
 *
 * Lexicographic sorting only happens when `sort` is requested, LEX is set,
 * and ELIMINATE is enabled.
 */
export function simplify(expr: BitExpr, flags: number, sort: boolean): BitExpr {
  let result = expr;
  if (flags & Optimize.FLATTEN) {
    result = flatten(result);
  }
  if (flags & Optimize.ELIMINATE) {
    result = eliminate(result, { sortLex: sort && (flags & Optimize.LEX) !== 0 });
  }
  return result;
}

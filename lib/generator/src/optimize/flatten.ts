/**
 * XOR tree flattening.
 */

import { xor, type BitExpr } from "../ir/bit.js";

/**
 * Splices nested XOR operands into a single-level operand list.
 */
export function flattenOperands(expr: BitExpr): BitExpr[] {
  if (expr.kind !== "xor") {
    return [expr];
  }
  return expr.operands.flatMap(flattenOperands);
}

/**
 * Rewrites an XOR-of-XOR tree into a single XOR. Other nodes are returned as is.
 */
export function flatten(expr: BitExpr): BitExpr {
  if (expr.kind !== "xor") {
    return expr;
  }
  return xor(...flattenOperands(expr));
}

/**
 * Redundant XOR operand elimination.
 *
 * XOR is self-inverse and commutative, so for every input bit only the
 * parity of its occurrence count matters, and constant zero is the identity.
 */

import { CrcGenError } from "../diagnostic/index.js";
import {
  bitIdentity,
  compareSortKeys,
  constBit,
  sortKey,
  xor,
  type BitExpr,
  type InputBit,
} from "../ir/bit.js";

export interface EliminateOptions {
  /** Reorder surviving operands by ascending sort key. */
  sortLex: boolean;
}

/**
 * Cancels pairs of identical input bits and constant ones, and drops constant zeros.
 *
 * Operands that are still XOR nodes (flattening skipped) cannot be analyzed
 * and are kept in front. Non-XOR expressions are returned unchanged.
 */
export function eliminate(expr: BitExpr, options: EliminateOptions): BitExpr {
  if (expr.kind !== "xor") {
    return expr;
  }
  if (expr.operands.length === 0) {
    throw CrcGenError.invariant("XOR node without operands");
  }

  const kept: BitExpr[] = [];
  const bits = new Map<string, { bit: InputBit; count: number }>();
  let ones = 0;

  for (const operand of expr.operands) {
    switch (operand.kind) {
      case "bit": {
        const id = bitIdentity(operand);
        const entry = bits.get(id);
        if (entry) {
          entry.count++;
        } else {
          bits.set(id, { bit: operand, count: 1 });
        }
        break;
      }
      case "const":
        if (operand.value) {
          ones++;
        }
        break;
      case "xor":
        kept.push(operand);
        break;
    }
  }

  for (const { bit, count } of bits.values()) {
    if (count % 2 === 1) {
      kept.push(bit);
    }
  }
  if (ones % 2 === 1) {
    kept.push(constBit(true));
  }

  if (options.sortLex) {
    kept.sort((a, b) => compareSortKeys(sortKey(a), sortKey(b)));
  }

  if (kept.length === 0) {
    kept.push(constBit(false));
  }

  return xor(...kept);
}

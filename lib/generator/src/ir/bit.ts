/**
 * Bit-level expression representation.
 *
 * Every output bit of an unrolled CRC step is a BitExpr: a reference to one
 * bit of a symbolic input word, a constant, or an XOR of sub-expressions.
 * Nodes are frozen and compared by value.
 */

/**
 * The symbolic input words an expression can reference.
 */
export type InputSource = "crc" | "data";

/**
 * A single output bit's expression.
 */
export type BitExpr =
  | { readonly kind: "bit"; readonly source: InputSource; readonly index: number }
  | { readonly kind: "const"; readonly value: boolean }
  | { readonly kind: "xor"; readonly operands: readonly BitExpr[] };

export type InputBit = Extract<BitExpr, { kind: "bit" }>;
export type ConstBit = Extract<BitExpr, { kind: "const" }>;
export type XorExpr = Extract<BitExpr, { kind: "xor" }>;

const SORT_KEY_DIGITS = 7;

const ZERO: ConstBit = Object.freeze({ kind: "const", value: false });
const ONE: ConstBit = Object.freeze({ kind: "const", value: true });

/**
 * Creates a reference to bit `index` of an input word.
 */
export function inputBit(source: InputSource, index: number): InputBit {
  return Object.freeze({ kind: "bit", source, index });
}

/**
 * Creates a constant bit.
 */
export function constBit(value: boolean): ConstBit {
  return value ? ONE : ZERO;
}

/**
 * Creates an XOR node.
 */
export function xor(...operands: BitExpr[]): XorExpr {
  return Object.freeze({ kind: "xor", operands: Object.freeze(operands) });
}

/**
 * Structural equality.
 */
export function bitExprEquals(a: BitExpr, b: BitExpr): boolean {
  switch (a.kind) {
    case "bit":
      return b.kind === "bit" && a.source === b.source && a.index === b.index;
    case "const":
      return b.kind === "const" && a.value === b.value;
    case "xor":
      if (b.kind !== "xor" || a.operands.length !== b.operands.length) {
        return false;
      }
      return a.operands.every((operand, i) => {
        const other = b.operands[i];
        return other !== undefined && bitExprEquals(operand, other);
      });
  }
}

/**
 * Identity of an input bit, used to group repeated references.
 */
export function bitIdentity(bit: InputBit): string {
  return `${bit.source}:${bit.index}`;
}

/**
 * Deterministic ordering key.
 *
 * Indices are zero-padded so that string order matches numeric order.
 */
export function sortKey(expr: BitExpr): string {
  switch (expr.kind) {
    case "bit":
      return `${expr.source}_${String(expr.index).padStart(SORT_KEY_DIGITS, "0")}`;
    case "const":
      return expr.value ? "1" : "0";
    case "xor":
      return expr.operands.map(sortKey).join("__");
  }
}

/**
 * Code-point comparison of sort keys (never locale-dependent).
 */
export function compareSortKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Counts the nodes of an expression tree.
 */
export function nodeCount(expr: BitExpr): number {
  if (expr.kind !== "xor") {
    return 1;
  }
  let count = 1;
  for (const operand of expr.operands) {
    count += nodeCount(operand);
  }
  return count;
}

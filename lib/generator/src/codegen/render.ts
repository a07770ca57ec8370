/**
 * Expression rendering contract shared by all backends.
 */

import { CrcGenError } from "../diagnostic/index.js";
import type { BitExpr, InputSource } from "../ir/index.js";

/**
 * How a backend spells each kind of expression node.
 */
export interface ExprRenderer {
  bit(source: InputSource, index: number): string;
  constant(value: boolean): string;
  xor(operands: string[]): string;
}

/**
 * Names the generated function or module and its parameters.
 */
export interface Naming {
  /** Function, module, entity or block name. */
  name: string;
  /** Input CRC parameter. */
  crcInName: string;
  /** Input data parameter. */
  dataName: string;
  /** Output CRC parameter (modules only). */
  crcOutName: string;
}

export function defaultNaming(): Naming {
  return {
    name: "crc",
    crcInName: "crcIn",
    dataName: "data",
    crcOutName: "crcOut",
  };
}

/**
 * Walks an expression tree bottom-up through the renderer.
 */
export function renderExpr(expr: BitExpr, renderer: ExprRenderer): string {
  switch (expr.kind) {
    case "bit":
      return renderer.bit(expr.source, expr.index);
    case "const":
      return renderer.constant(expr.value);
    case "xor":
      if (expr.operands.length === 0) {
        throw CrcGenError.invariant("XOR node without operands reached the renderer");
      }
      return renderer.xor(expr.operands.map((operand) => renderExpr(operand, renderer)));
  }
}

/**
 * Maps a symbolic input word to its parameter name.
 */
export function paramName(source: InputSource, naming: Naming): string {
  return source === "crc" ? naming.crcInName : naming.dataName;
}

/**
 * Builds a renderer from per-backend tokens.
 */
export function infixRenderer(options: {
  bit: (name: string, index: number) => string;
  zero: string;
  one: string;
  operator: string;
  naming: Naming;
}): ExprRenderer {
  return {
    bit: (source, index) => options.bit(paramName(source, options.naming), index),
    constant: (value) => (value ? options.one : options.zero),
    xor: (operands) => `(${operands.join(` ${options.operator} `)})`,
  };
}

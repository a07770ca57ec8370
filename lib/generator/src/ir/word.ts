/**
 * Fixed-width word of bit expressions.
 */

import { CrcGenError } from "../diagnostic/index.js";
import { eliminate, flatten, simplify } from "../optimize/index.js";
import { bitExprEquals, inputBit, type BitExpr, type InputSource } from "./bit.js";

/**
 * An ordered, fixed-length sequence of bit expressions. Index 0 is the LSB.
 *
 * Words never change after construction; the simplifier methods return a new word.
 */
export class Word implements Iterable<BitExpr> {
  readonly bits: readonly BitExpr[];

  constructor(bits: readonly BitExpr[]) {
    if (bits.length < 1) {
      throw CrcGenError.invariant("word must have at least one bit");
    }
    this.bits = Object.freeze([...bits]);
  }

  /**
   * Builds the symbolic input word `source[0..width)`.
   */
  static input(source: InputSource, width: number): Word {
    return new Word(Array.from({ length: width }, (_, i) => inputBit(source, i)));
  }

  get width(): number {
    return this.bits.length;
  }

  at(index: number): BitExpr {
    const bit = this.bits[index];
    if (bit === undefined) {
      throw CrcGenError.invariant(`bit index ${index} outside word of width ${this.width}`);
    }
    return bit;
  }

  [Symbol.iterator](): Iterator<BitExpr> {
    return this.bits[Symbol.iterator]();
  }

  flatten(): Word {
    return new Word(this.bits.map(flatten));
  }

  /**
   * Eliminates redundant operands of every bit, optionally sorting them.
   */
  eliminate(sortLex: boolean): Word {
    return new Word(this.bits.map((bit) => eliminate(bit, { sortLex })));
  }

  /**
   * Applies the optimizer steps selected by `flags` to every bit.
   */
  simplify(flags: number, sort: boolean): Word {
    return new Word(this.bits.map((bit) => simplify(bit, flags, sort)));
  }

  equals(other: Word): boolean {
    return (
      this.width === other.width &&
      this.bits.every((bit, i) => bitExprEquals(bit, other.at(i)))
    );
  }
}

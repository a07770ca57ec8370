/**
 * Register unroll algorithm.
 *
 * Symbolically runs a linear-feedback shift register over every bit of one
 * input data word. The result is the next CRC register value, one closed-form
 * XOR expression per bit, in terms of the `crc` and `data` input words.
 */

import { validateConfig, type GeneratorConfig } from "./config.js";
import { constBit, xor, Word, type BitExpr } from "./ir/index.js";

/**
 * Unrolls one CRC update step for the configuration.
 *
 * The word is simplified after every shift step and once more, with
 * sorting, at the end.
 */
export function unrollRegister(config: GeneratorConfig): Word {
  validateConfig(config);

  const { crcBits, dataBits, shiftRight } = config;
  const inData = Word.input("data", dataBits);
  let word = Word.input("crc", crcBits);

  for (let step = 0; step < dataBits; step++) {
    // Right shift consumes the data word LSB first, left shift MSB first.
    const dataBit = inData.at(shiftRight ? step : dataBits - 1 - step);
    word = shiftStep(word, dataBit, config).simplify(config.optimize, false);
  }

  return word.simplify(config.optimize, true);
}

/**
 * Runs the shift register once.
 */
function shiftStep(word: Word, dataBit: BitExpr, config: GeneratorConfig): Word {
  const { crcBits, shiftRight, polynomial } = config;
  const bits: BitExpr[] = [];

  for (let j = 0; j < crcBits; j++) {
    let stateBit: BitExpr;
    let queryBit: BitExpr;
    if (shiftRight) {
      stateBit = j < crcBits - 1 ? word.at(j + 1) : constBit(false);
      queryBit = xor(word.at(0), dataBit);
    } else {
      stateBit = j > 0 ? word.at(j - 1) : constBit(false);
      queryBit = xor(word.at(crcBits - 1), dataBit);
    }
    // Feedback only lands on the polynomial's set bits.
    bits.push(((polynomial >> BigInt(j)) & 1n) === 1n ? xor(stateBit, queryBit) : stateBit);
  }

  return new Word(bits);
}

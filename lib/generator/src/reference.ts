/**
 * Bit-serial CRC reference implementation.
 *
 * Used only to cross-check generated code.
 */

import { crcMask } from "./config.js";

export interface ReferenceParams {
  polynomial: bigint;
  crcBits: number;
  dataBits: number;
  shiftRight: boolean;
}

/**
 * Computes one CRC update step over a single input word.
 */
export function crcReference(crc: bigint, data: bigint, params: ReferenceParams): bigint {
  const { polynomial, crcBits, dataBits, shiftRight } = params;
  const mask = crcMask(crcBits);
  const msb = 1n << BigInt(crcBits - 1);
  let reg = crc;
  let input = data;

  if (shiftRight) {
    for (let i = 0; i < dataBits; i++) {
      reg ^= input & 1n;
      input >>= 1n;
      reg = reg & 1n ? ((reg >> 1n) ^ polynomial) & mask : (reg >> 1n) & mask;
    }
  } else {
    for (let i = 0; i < dataBits; i++) {
      reg ^= ((input >> BigInt(dataBits - 1)) & 1n) << BigInt(crcBits - 1);
      input <<= 1n;
      reg = reg & msb ? ((reg << 1n) ^ polynomial) & mask : (reg << 1n) & mask;
    }
  }

  return reg;
}

export interface BlockOptions {
  /** Complement the register before the first word. */
  preFlip?: boolean;
  /** Complement the register after the last word. */
  postFlip?: boolean;
}

/**
 * Runs a sequence of input words through {@link crcReference}.
 */
export function crcReferenceBlock(
  crc: bigint,
  words: Iterable<bigint>,
  params: ReferenceParams,
  options: BlockOptions = {}
): bigint {
  const mask = crcMask(params.crcBits);
  let reg = options.preFlip ? crc ^ mask : crc;
  for (const word of words) {
    reg = crcReference(reg, word, params);
  }
  return options.postFlip ? reg ^ mask : reg;
}

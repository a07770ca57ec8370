/**
 * crcforge convert - Converts a polynomial between string and integer form.
 */

import { CrcGenError, formatHex, intToPoly, polyToInt } from "../../../lib/generator/src/index.js";
import type { ConvertOptions } from "../args.js";
import { logger } from "../utils/logger.js";

/**
 * Converts the polynomial and returns the printed line.
 */
export function convertPolynomial(polynomial: string, options: ConvertOptions): string {
  if (options.crcBits === undefined) {
    throw new Error("-B|--crc-bits is required for convert");
  }
  if (!Number.isInteger(options.crcBits) || options.crcBits < 1) {
    throw CrcGenError.invalidCrcWidth(options.crcBits);
  }
  if (polynomial.includes("^")) {
    return formatHex(polyToInt(polynomial, options.crcBits, options.shiftRight));
  }
  // Plain integers are read unmasked; intToPoly masks to the width.
  const value = /^\s*(0x[0-9a-f]+|[0-9]+)\s*$/i.exec(polynomial)?.[1];
  if (value === undefined) {
    throw CrcGenError.invalidPolynomial(polynomial);
  }
  return intToPoly(BigInt(value.toLowerCase()), options.crcBits, options.shiftRight);
}

export async function convert(polynomial: string, options: ConvertOptions): Promise<void> {
  try {
    logger.raw(convertPolynomial(polynomial, options));
  } catch (error) {
    logger.failure(error);
    process.exitCode = 1;
  }
}

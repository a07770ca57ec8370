/**
 * Polynomial coefficient conversion.
 */

import { crcMask } from "./config.js";
import { CrcGenError } from "./diagnostic/index.js";

/**
 * Reverses the lowest `bits` bits of a value.
 */
export function bitReverse(value: bigint, bits: number): bigint {
  let result = 0n;
  let rest = value;
  for (let i = 0; i < bits; i++) {
    result = (result << 1n) | (rest & 1n);
    rest >>= 1n;
  }
  return result;
}

/**
 * Converts a polynomial to its coefficient integer.
 *
 * Accepts hex (`0x1021`), decimal (`4129`) or a coefficient string
 * (`x^16 + x^12 + x^5 + 1`). The implicit leading term is masked off; for
 * right shifting CRCs the result is bit-reversed.
 */
export function polyToInt(text: string, crcBits: number, shiftRight = false): bigint {
  const normalized = text.trim().toLowerCase();
  let poly: bigint;

  if (normalized.startsWith("0x")) {
    const digits = normalized.slice(2);
    if (!/^[0-9a-f]+$/.test(digits)) {
      throw CrcGenError.invalidPolynomial(text);
    }
    poly = BigInt(`0x${digits}`);
  } else if (/^[0-9]+$/.test(normalized)) {
    poly = BigInt(normalized);
  } else {
    poly = parseCoefficients(text);
  }

  poly &= crcMask(crcBits);
  return shiftRight ? bitReverse(poly, crcBits) : poly;
}

function parseCoefficients(text: string): bigint {
  const compact = text.toLowerCase().replace(/\s+/g, "");
  let poly = 0n;
  for (const term of compact.split("+")) {
    const power = /^x\^([0-9]+)$/.exec(term);
    if (power?.[1] !== undefined) {
      poly |= 1n << BigInt(power[1]);
    } else if (term === "x") {
      poly |= 1n << 1n;
    } else if (term === "1") {
      poly |= 1n;
    } else {
      throw CrcGenError.invalidPolynomial(text);
    }
  }
  return poly;
}

/**
 * Converts a coefficient integer to its canonical polynomial string,
 * highest power first, including the implicit x^crcBits term.
 */
export function intToPoly(poly: bigint, crcBits: number, shiftRight = false): string {
  let rest = poly & crcMask(crcBits);
  if (shiftRight) {
    rest = bitReverse(rest, crcBits);
  }

  const terms: string[] = [];
  for (let shift = 0; rest !== 0n; shift++, rest >>= 1n) {
    if ((rest & 1n) === 0n) {
      continue;
    }
    if (shift === 0) {
      terms.push("1");
    } else if (shift === 1) {
      terms.push("x");
    } else {
      terms.push(`x^${shift}`);
    }
  }
  terms.push(`x^${crcBits}`);

  return terms.reverse().join(" + ");
}

/**
 * Formats a value as upper-case hex with a 0x prefix.
 */
export function formatHex(value: bigint): string {
  return `0x${value.toString(16).toUpperCase()}`;
}

/**
 * Polynomial conversion tests.
 */

import { describe, expect, it } from "vitest";
import * as fc from "fast-check";
import { ErrorCode } from "../src/diagnostic/index.js";
import { bitReverse, formatHex, intToPoly, polyToInt } from "../src/polynomial.js";
import { thrown } from "./setup/evaluate.js";

const CRC32_POLY = "x^32 + x^26 + x^23 + x^22 + x^16 + x^12 + x^11 + x^10 + x^8 + x^7 + x^5 + x^4 + x^2 + x + 1";

describe("bitReverse", () => {
  it("reverses the given number of bits", () => {
    expect(bitReverse(0b0001n, 4)).toBe(0b1000n);
    expect(bitReverse(0x07n, 8)).toBe(0xe0n);
    expect(bitReverse(0x04c11db7n, 32)).toBe(0xedb88320n);
  });

  it("is an involution", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 80 }), fc.bigUintN(80), (bits, value) => {
        const masked = value & ((1n << BigInt(bits)) - 1n);
        expect(bitReverse(bitReverse(masked, bits), bits)).toBe(masked);
      })
    );
  });
});

describe("polyToInt", () => {
  it("parses coefficient strings without the leading term", () => {
    expect(polyToInt("x^8 + x^2 + x + 1", 8)).toBe(0x07n);
    expect(polyToInt("x^16 + x^12 + x^5 + 1", 16)).toBe(0x1021n);
  });

  it("ignores case and whitespace", () => {
    expect(polyToInt("X^8+X^2 +X+ 1", 8)).toBe(0x07n);
  });

  it("bit-reverses for right shifting CRCs", () => {
    expect(polyToInt(CRC32_POLY, 32, true)).toBe(0xedb88320n);
  });

  it("parses hex and decimal and masks to the width", () => {
    expect(polyToInt("0x1021", 16)).toBe(0x1021n);
    expect(polyToInt("4129", 16)).toBe(0x1021n);
    expect(polyToInt("0x11021", 16)).toBe(0x1021n);
  });

  it.each(["x^a + 1", "y + 1", "0xZZ", "x^8 + + 1", ""])("rejects %j", (text) => {
    expect(thrown(() => polyToInt(text, 8))).toMatchObject({ code: ErrorCode.INVALID_POLYNOMIAL });
  });
});

describe("intToPoly", () => {
  it("renders the canonical form highest power first", () => {
    expect(intToPoly(0x07n, 8)).toBe("x^8 + x^2 + x + 1");
    expect(intToPoly(0xedb88320n, 32, true)).toBe(CRC32_POLY);
  });

  it("renders only the implicit term for zero", () => {
    expect(intToPoly(0n, 8)).toBe("x^8");
  });

  it("round-trips the canonical string", () => {
    const text = "x^8 + x^2 + x + 1";
    expect(intToPoly(polyToInt(text, 8, false), 8, false)).toBe(text);
  });

  it("round-trips integers in both directions", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 64 }), fc.bigUintN(64), fc.boolean(), (bits, value, shiftRight) => {
        const poly = value & ((1n << BigInt(bits)) - 1n);
        expect(polyToInt(intToPoly(poly, bits, shiftRight), bits, shiftRight)).toBe(poly);
      })
    );
  });
});

describe("formatHex", () => {
  it("uses upper-case digits", () => {
    expect(formatHex(0xedb88320n)).toBe("0xEDB88320");
    expect(formatHex(0n)).toBe("0x0");
  });
});

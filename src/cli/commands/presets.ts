/**
 * crcforge presets - Lists the named CRC algorithms.
 */

import { CRC_PARAMETERS, formatHex, intToPoly } from "../../../lib/generator/src/index.js";
import { logger } from "../utils/logger.js";

/**
 * One line per preset: name, width, direction, hex and coefficient polynomial.
 */
export function formatPresets(): string[] {
  const width = Math.max(...Object.keys(CRC_PARAMETERS).map((name) => name.length));
  return Object.entries(CRC_PARAMETERS).map(([name, p]) => {
    const shift = p.shiftRight ? "right" : "left ";
    const bits = String(p.crcBits).padStart(2, " ");
    return `${name.padEnd(width)}  ${bits} bits  ${shift}  ${formatHex(p.polynomial)}  ${intToPoly(p.polynomial, p.crcBits, p.shiftRight)}`;
  });
}

export function presets(): void {
  for (const line of formatPresets()) {
    logger.raw(line);
  }
}

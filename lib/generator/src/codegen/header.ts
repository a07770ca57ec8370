/**
 * Shared header and algorithm description of generated files.
 */

import type { GeneratorConfig } from "../config.js";
import { formatHex, intToPoly } from "../polynomial.js";

/**
 * Generated-code notice for the given language.
 */
export function generatedNotice(language: string): string[] {
  return [
    `THIS IS GENERATED ${language.toUpperCase()} CODE.`,
    "",
    "This code is Public Domain.",
    "Permission to use, copy, modify, and/or distribute this software for any",
    "purpose with or without fee is hereby granted.",
    "",
    'THE SOFTWARE IS PROVIDED "AS IS" AND THE AUTHOR DISCLAIMS ALL WARRANTIES',
    "WITH REGARD TO THIS SOFTWARE INCLUDING ALL IMPLIED WARRANTIES OF",
    "MERCHANTABILITY AND FITNESS.",
  ];
}

/**
 * Human readable description of the CRC parameters.
 */
export function describeAlgorithm(config: GeneratorConfig): string[] {
  const shift = config.shiftRight ? "right (little endian)" : "left (big endian)";
  return [
    `CRC polynomial coefficients: ${intToPoly(config.polynomial, config.crcBits, config.shiftRight)}`,
    `                             ${formatHex(config.polynomial)} (hex)`,
    `CRC width:                   ${config.crcBits} bits`,
    `CRC shift direction:         ${shift}`,
    `Input word width:            ${config.dataBits} bits`,
  ];
}

/**
 * Prefixes each line with a comment token. Empty lines keep no trailing space.
 */
export function commentLines(lines: string[], token: string): string[] {
  return lines.map((line) => (line ? `${token} ${line}` : token));
}

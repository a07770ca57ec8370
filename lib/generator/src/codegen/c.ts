/**
 * C backend.
 */

import type { GeneratorConfig } from "../config.js";
import { CrcGenError } from "../diagnostic/index.js";
import type { Word } from "../ir/index.js";
import { commentLines, describeAlgorithm, generatedNotice } from "./header.js";
import { infixRenderer, renderExpr, type Naming } from "./render.js";

export interface COptions {
  /** Declare the function static. */
  static?: boolean;
  /** Declare the function inline. */
  inline?: boolean;
  /** Emit only an extern prototype. */
  declOnly?: boolean;
  includeGuards?: boolean;
  includes?: boolean;
}

const C_WIDTHS = [8, 16, 32, 64] as const;

/**
 * Smallest stdint type holding `bits` bits.
 */
export function cType(bits: number, what: string): string {
  const width = C_WIDTHS.find((w) => bits <= w);
  if (width === undefined) {
    throw CrcGenError.unsupportedBackendWidth("C", what, bits, 64);
  }
  return `uint${width}_t`;
}

export function generateC(word: Word, config: GeneratorConfig, naming: Naming, options: COptions = {}): string {
  const { name, crcInName, dataName } = naming;
  const { declOnly = false, includeGuards = true, includes = true } = options;
  const crcType = cType(config.crcBits, "CRC");
  const dataType = cType(config.dataBits, "Input data");
  const guard = `${name.toUpperCase()}_H_`;
  const renderer = infixRenderer({
    bit: (param, index) => `b(${param}, ${index})`,
    zero: "0u",
    one: "1u",
    operator: "^",
    naming,
  });

  const lines = ["// vim: ts=4 sw=4 expandtab", "", ...commentLines(generatedNotice("C"), "//"), ""];
  if (includeGuards) {
    lines.push(`#ifndef ${guard}`, `#define ${guard}`);
  }
  if (includes) {
    lines.push("", "#include <stdint.h>");
  }
  lines.push("", ...commentLines(describeAlgorithm(config), "//"), "");

  if (!declOnly) {
    lines.push("#ifdef b", "# undef b", "#endif", "#define b(x, b) (((x) >> (b)) & 1u)", "");
  }

  const qualifiers = [
    declOnly ? "extern " : "",
    options.static && !declOnly ? "static " : "",
    options.inline && !declOnly ? "inline " : "",
  ].join("");
  const end = declOnly ? ";" : "";
  lines.push(`${qualifiers}${crcType} ${name}(${crcType} ${crcInName}, ${dataType} ${dataName})${end}`);

  if (!declOnly) {
    lines.push("{", `    ${crcType} ret;`);
    word.bits.forEach((bit, i) => {
      const operator = i > 0 ? "|=" : " =";
      lines.push(`    ret ${operator} (${crcType})${renderExpr(bit, renderer)} << ${i};`);
    });
    lines.push("    return ret;", "}", "#undef b");
  }

  if (includeGuards) {
    lines.push("", `#endif /* ${guard} */`);
  }

  return lines.join("\n");
}

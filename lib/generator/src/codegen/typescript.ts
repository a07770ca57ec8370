/**
 * TypeScript / JavaScript backend.
 *
 * Emits a bigint function, so any CRC and data width is supported.
 */

import type { GeneratorConfig } from "../config.js";
import type { Word } from "../ir/index.js";
import { commentLines, describeAlgorithm, generatedNotice } from "./header.js";
import { infixRenderer, renderExpr, type Naming } from "./render.js";

export interface TypeScriptOptions {
  /** Emit plain JavaScript without type annotations. */
  javascript?: boolean;
}

export function generateTypeScript(
  word: Word,
  config: GeneratorConfig,
  naming: Naming,
  options: TypeScriptOptions = {}
): string {
  const { name, crcInName, dataName } = naming;
  const js = options.javascript ?? false;
  const typed = (annotation: string): string => (js ? "" : annotation);
  const renderer = infixRenderer({
    bit: (param, index) => `b(${param}, ${index})`,
    zero: "0n",
    one: "1n",
    operator: "^",
    naming,
  });

  const lines = [
    ...commentLines(generatedNotice(js ? "JavaScript" : "TypeScript"), "//"),
    "",
    ...commentLines(describeAlgorithm(config), "//"),
    "",
    `export function ${name}(${crcInName}${typed(": bigint")}, ${dataName}${typed(": bigint")})${typed(": bigint")} {`,
    `  const b = (x${typed(": bigint")}, i${typed(": number")})${typed(": bigint")} => (x >> BigInt(i)) & 1n;`,
    "  let ret = 0n;",
  ];
  word.bits.forEach((bit, i) => {
    lines.push(`  ret |= ${renderExpr(bit, renderer)} << ${i}n;`);
  });
  lines.push("  return ret;", "}", "");

  return lines.join("\n");
}

/**
 * Python backend.
 */

import type { GeneratorConfig } from "../config.js";
import type { Word } from "../ir/index.js";
import { commentLines, describeAlgorithm, generatedNotice } from "./header.js";
import { infixRenderer, renderExpr, type Naming } from "./render.js";

export function generatePython(word: Word, config: GeneratorConfig, naming: Naming): string {
  const { name, crcInName, dataName } = naming;
  const renderer = infixRenderer({
    bit: (param, index) => `${param}[${index}]`,
    zero: "0",
    one: "1",
    operator: "^",
    naming,
  });

  const lines = [
    "# vim: ts=4 sw=4 expandtab",
    "",
    ...commentLines(generatedNotice("Python"), "#"),
    "",
    ...commentLines(describeAlgorithm(config), "#"),
    "",
    `def ${name}(${crcInName}, ${dataName}):`,
    "    class bitwrapper:",
    "        def __init__(self, x):",
    "            self.x = x",
    "        def __getitem__(self, i):",
    "            return ((self.x >> i) & 1)",
    "        def __setitem__(self, i, x):",
    "            self.x = (self.x | (1 << i)) if x else (self.x & ~(1 << i))",
    `    ${crcInName} = bitwrapper(${crcInName})`,
    `    ${dataName} = bitwrapper(${dataName})`,
    "    ret = bitwrapper(0)",
  ];
  word.bits.forEach((bit, i) => {
    lines.push(`    ret[${i}] = ${renderExpr(bit, renderer)}`);
  });
  lines.push("    return ret.x");

  return lines.join("\n");
}

/**
 * MyHDL backend.
 */

import type { GeneratorConfig } from "../config.js";
import type { Word } from "../ir/index.js";
import { commentLines, describeAlgorithm, generatedNotice } from "./header.js";
import { infixRenderer, renderExpr, type Naming } from "./render.js";

export function generateMyHdl(word: Word, config: GeneratorConfig, naming: Naming): string {
  const { name, crcInName, dataName, crcOutName } = naming;
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
    ...commentLines(generatedNotice("MyHDL"), "#"),
    "",
    ...commentLines(describeAlgorithm(config), "#"),
    "",
    "from myhdl import *",
    "",
    "@block",
    `def ${name}(${crcInName}, ${dataName}, ${crcOutName}):`,
    "    @always_comb",
    "    def logic():",
  ];
  word.bits.forEach((bit, i) => {
    lines.push(`        ${crcOutName}[${i}].next = ${renderExpr(bit, renderer)}`);
  });
  lines.push(
    "    return logic",
    "",
    "if __name__ == '__main__':",
    `    instance = ${name}(`,
    `        ${crcInName}=Signal(intbv(0)[${config.crcBits}:]),`,
    `        ${dataName}=Signal(intbv(0)[${config.dataBits}:]),`,
    `        ${crcOutName}=Signal(intbv(0)[${config.crcBits}:])`,
    "    )",
    "    instance.convert(hdl='Verilog')",
    "    instance.convert(hdl='VHDL')"
  );

  return lines.join("\n");
}

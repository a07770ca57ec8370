/**
 * Verilog backend (function or module).
 */

import type { GeneratorConfig } from "../config.js";
import type { Word } from "../ir/index.js";
import { commentLines, describeAlgorithm, generatedNotice } from "./header.js";
import { infixRenderer, renderExpr, type Naming } from "./render.js";

export interface VerilogOptions {
  /** Emit a `function automatic` instead of a module. */
  genFunction?: boolean;
}

export function generateVerilog(
  word: Word,
  config: GeneratorConfig,
  naming: Naming,
  options: VerilogOptions = {}
): string {
  const { name, crcInName, dataName, crcOutName } = naming;
  const genFunction = options.genFunction ?? true;
  const guard = `${name.toUpperCase()}_V_`;
  const renderer = infixRenderer({
    bit: (param, index) => `${param}[${index}]`,
    zero: "1'b0",
    one: "1'b1",
    operator: "^",
    naming,
  });

  const lines = ["// vim: ts=4 sw=4 expandtab", "", ...commentLines(generatedNotice("Verilog"), "//"), ""];
  if (!genFunction) {
    lines.push(`\`ifndef ${guard}`, `\`define ${guard}`, "");
  }
  lines.push(...commentLines(describeAlgorithm(config), "//"), "");

  const end = genFunction ? ";" : ",";
  lines.push(
    genFunction ? `function automatic [${config.crcBits - 1}:0] ${name};` : `module ${name} (`,
    `    input [${config.crcBits - 1}:0] ${crcInName}${end}`,
    `    input [${config.dataBits - 1}:0] ${dataName}${end}`
  );
  if (genFunction) {
    lines.push("begin");
  } else {
    lines.push(`    output [${config.crcBits - 1}:0] ${crcOutName}`, ");");
  }

  word.bits.forEach((bit, i) => {
    const target = genFunction ? `${name}[${i}]` : `assign ${crcOutName}[${i}]`;
    lines.push(`    ${target} = ${renderExpr(bit, renderer)};`);
  });

  if (genFunction) {
    lines.push("end", "endfunction");
  } else {
    lines.push("endmodule", "", `\`endif // ${guard}`);
  }

  return lines.join("\n");
}

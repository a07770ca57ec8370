/**
 * VHDL backend.
 */

import type { GeneratorConfig } from "../config.js";
import type { Word } from "../ir/index.js";
import { commentLines, describeAlgorithm, generatedNotice } from "./header.js";
import { infixRenderer, renderExpr, type Naming } from "./render.js";

export function generateVhdl(word: Word, config: GeneratorConfig, naming: Naming): string {
  const { name, crcInName, dataName, crcOutName } = naming;
  const renderer = infixRenderer({
    bit: (param, index) => `${param}(${index})`,
    zero: 'b"0"',
    one: 'b"1"',
    operator: "xor",
    naming,
  });

  const lines = [
    "-- vim: ts=4 sw=4 expandtab",
    "",
    ...commentLines(generatedNotice("VHDL"), "--"),
    "",
    ...commentLines(describeAlgorithm(config), "--"),
    "",
    "library IEEE;",
    "use IEEE.std_logic_1164.all;",
    "",
    `entity ${name} is`,
    "    port (",
    `        ${crcInName}: in std_logic_vector(${config.crcBits - 1} downto 0);`,
    `        ${dataName}: in std_logic_vector(${config.dataBits - 1} downto 0);`,
    `        ${crcOutName}: out std_logic_vector(${config.crcBits - 1} downto 0)`,
    "    );",
    `end entity ${name};`,
    "",
    `architecture Behavioral of ${name} is`,
    "begin",
  ];
  word.bits.forEach((bit, i) => {
    lines.push(`    ${crcOutName}(${i}) <= ${renderExpr(bit, renderer)};`);
  });
  lines.push("end architecture Behavioral;");

  return lines.join("\n");
}

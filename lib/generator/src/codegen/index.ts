/**
 * Code generation module.
 */

import type { GeneratorConfig } from "../config.js";
import { CrcGenError } from "../diagnostic/index.js";
import type { Word } from "../ir/index.js";
import { generateC, type COptions } from "./c.js";
import { generateMyHdl } from "./myhdl.js";
import { generatePython } from "./python.js";
import { defaultNaming, type Naming } from "./render.js";
import { generateTypeScript } from "./typescript.js";
import { generateVerilog } from "./verilog.js";
import { generateVhdl } from "./vhdl.js";

export { type ExprRenderer, type Naming, defaultNaming, renderExpr, paramName, infixRenderer } from "./render.js";
export { generatedNotice, describeAlgorithm } from "./header.js";
export { generateC, cType, type COptions } from "./c.js";
export { generatePython } from "./python.js";
export { generateVerilog, type VerilogOptions } from "./verilog.js";
export { generateVhdl } from "./vhdl.js";
export { generateMyHdl } from "./myhdl.js";
export { generateTypeScript, type TypeScriptOptions } from "./typescript.js";

/**
 * Output targets and their file extensions.
 */
export const TARGETS = {
  c: "h",
  python: "py",
  "verilog-function": "v",
  "verilog-module": "v",
  vhdl: "vhd",
  myhdl: "py",
  typescript: "ts",
  javascript: "js",
} as const;

export type Target = keyof typeof TARGETS;

/**
 * Target-specific switches. Only the c target reads them; the others ignore
 * them.
 */
export type CodegenOptions = COptions;

/**
 * A generated output file.
 */
export interface GeneratedFile {
  path: string;
  content: string;
}

export function isTarget(value: string): value is Target {
  return Object.hasOwn(TARGETS, value);
}

/**
 * Parses a target name.
 */
export function parseTarget(value: string): Target {
  if (!isTarget(value)) {
    throw CrcGenError.unknownTarget(value, Object.keys(TARGETS));
  }
  return value;
}

/**
 * Renders the unrolled word for one target.
 */
export function generate(
  target: Target,
  word: Word,
  config: GeneratorConfig,
  naming: Naming = defaultNaming(),
  options: CodegenOptions = {}
): GeneratedFile {
  return {
    path: `${naming.name}.${TARGETS[target]}`,
    content: render(target, word, config, naming, options),
  };
}

function render(target: Target, word: Word, config: GeneratorConfig, naming: Naming, options: CodegenOptions): string {
  switch (target) {
    case "c":
      return generateC(word, config, naming, options);
    case "python":
      return generatePython(word, config, naming);
    case "verilog-function":
      return generateVerilog(word, config, naming, { genFunction: true });
    case "verilog-module":
      return generateVerilog(word, config, naming, { genFunction: false });
    case "vhdl":
      return generateVhdl(word, config, naming);
    case "myhdl":
      return generateMyHdl(word, config, naming);
    case "typescript":
      return generateTypeScript(word, config, naming);
    case "javascript":
      return generateTypeScript(word, config, naming, { javascript: true });
  }
}

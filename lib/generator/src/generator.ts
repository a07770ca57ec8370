/**
 * Combinatorial CRC generator.
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";

import { generate, type CodegenOptions, type GeneratedFile, type Naming, type Target, defaultNaming } from "./codegen/index.js";
import { mergeConfig, validateConfig, type GeneratorConfig } from "./config.js";
import type { Word } from "./ir/index.js";
import { unrollRegister } from "./unroll.js";

/**
 * Generates table-free CRC code for one configuration.
 */
export class CrcGenerator {
  readonly config: GeneratorConfig;
  private word?: Word;

  constructor(config?: Partial<GeneratorConfig>) {
    this.config = mergeConfig(config ?? {});
    validateConfig(this.config);
  }

  /**
   * Unrolls and simplifies one CRC step. The result is cached.
   */
  build(): Word {
    this.word ??= unrollRegister(this.config);
    return this.word;
  }

  /**
   * Renders the CRC step for a target.
   */
  generate(target: Target, naming?: Partial<Naming>, options?: CodegenOptions): GeneratedFile {
    return generate(target, this.build(), this.config, { ...defaultNaming(), ...naming }, options);
  }

  /**
   * Renders the CRC step and writes it to `outPath`.
   */
  async generateToFile(
    target: Target,
    outPath: string,
    naming?: Partial<Naming>,
    options?: CodegenOptions
  ): Promise<GeneratedFile> {
    const generated = this.generate(target, naming, options);

    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, generated.content + "\n", "utf-8");

    return { path: outPath, content: generated.content };
  }
}

/**
 * Creates a new generator with the given config.
 */
export function createGenerator(config?: Partial<GeneratorConfig>): CrcGenerator {
  return new CrcGenerator(config);
}

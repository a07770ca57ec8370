/**
 * crcforge generate - Renders CRC code for one target.
 */

import { relative, resolve } from "path";
import { CrcGenerator, parseTarget, resolveParameters } from "../../../lib/generator/src/index.js";
import type { GenerateOptions } from "../args.js";
import { logger } from "../utils/logger.js";

export async function generate(targetName: string, options: GenerateOptions): Promise<void> {
  try {
    const target = parseTarget(targetName);
    const generator = new CrcGenerator(resolveParameters(options));
    const naming = {
      name: options.name,
      crcInName: options.crcInParam,
      dataName: options.dataParam,
      crcOutName: options.crcOutParam,
    };
    const codegenOptions = { static: options.static, inline: options.inline };
    if (target !== "c" && (options.static || options.inline)) {
      logger.warn(`-S|--static and -I|--inline only apply to the c target, ignored for ${target}`);
    }

    if (options.file === undefined) {
      logger.raw(generator.generate(target, naming, codegenOptions).content);
      return;
    }

    const startTime = performance.now();
    const outPath = resolve(process.cwd(), options.file);
    await generator.generateToFile(target, outPath, naming, codegenOptions);

    const elapsed = ((performance.now() - startTime) / 1000).toFixed(2);
    logger.success(`Generated ${target} code in ${elapsed}s`);
    logger.file(relative(process.cwd(), outPath));
  } catch (error) {
    logger.failure(error);
    process.exitCode = 1;
  }
}

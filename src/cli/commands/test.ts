/**
 * crcforge test - Cross-checks generated code against the reference CRC.
 */

import { formatHex, resolveParameters, runSelfTest } from "../../../lib/generator/src/index.js";
import type { AlgorithmOptions } from "../args.js";
import { logger } from "../utils/logger.js";

export async function test(options: AlgorithmOptions): Promise<void> {
  const startTime = performance.now();

  try {
    const config = resolveParameters(options);

    logger.header("crcforge test");
    logger.info(
      `Testing ${options.algorithm} P=${formatHex(config.polynomial)}, nrCrcBits=${config.crcBits}, ` +
        `shiftRight=${config.shiftRight ? 1 : 0}, nrDataBits=${config.dataBits}, optimize=${config.optimize} ...`
    );

    const report = runSelfTest(config);

    const elapsed = ((performance.now() - startTime) / 1000).toFixed(2);
    logger.step(`Compared ${report.checked} CRC steps with the reference`);
    logger.step(`Input seed ${report.seed}`);
    logger.success(`Passed in ${elapsed}s`);
  } catch (error) {
    logger.failure(error);
    process.exitCode = 1;
  }
}

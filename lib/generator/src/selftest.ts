/**
 * Differential self-test of generated code.
 *
 * Renders the TypeScript backend, transpiles it with the TypeScript compiler
 * API, runs it in process and compares every result with the bit-serial
 * reference.
 */

import ts from "typescript";

import { generateTypeScript } from "./codegen/typescript.js";
import { crcMask, validateConfig, type GeneratorConfig } from "./config.js";
import { CrcGenError } from "./diagnostic/index.js";
import { formatHex } from "./polynomial.js";
import { SeededRandom } from "./random.js";
import { crcReference } from "./reference.js";
import { unrollRegister } from "./unroll.js";

export type CrcStepFunction = (crc: bigint, data: bigint) => bigint;

export interface SelfTestOptions {
  seed?: number;
  /** Number of starting CRC values (0 and all-ones included). */
  crcSamples?: number;
  /** Maximum number of data words per starting CRC value. */
  dataSamples?: number;
  /** Chained steps per (crc, data) pair. */
  chain?: number;
}

export interface SelfTestReport {
  config: GeneratorConfig;
  /** Seed of the input sequence; rerunning with it repeats the test. */
  seed: number;
  /** Number of compared CRC steps. */
  checked: number;
}

const FUNCTION_NAME = "crcStep";

/**
 * Compiles the generated TypeScript for a configuration into a callable.
 */
export function compileStepFunction(config: GeneratorConfig): CrcStepFunction {
  const word = unrollRegister(config);
  const source = generateTypeScript(word, config, {
    name: FUNCTION_NAME,
    crcInName: "crcIn",
    dataName: "data",
    crcOutName: "crcOut",
  });

  const { outputText } = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2020,
    },
  });

  const exports: Record<string, unknown> = {};
  new Function("exports", outputText)(exports);

  const step = exports[FUNCTION_NAME];
  if (typeof step !== "function") {
    throw CrcGenError.invariant(`generated module does not export '${FUNCTION_NAME}'`);
  }

  return (crc, data) => {
    const result: unknown = step(crc, data);
    if (typeof result !== "bigint") {
      throw CrcGenError.invariant(`generated function returned ${typeof result}`);
    }
    return result;
  };
}

/**
 * Compares generated code with the reference over seeded random inputs.
 */
export function runSelfTest(config: GeneratorConfig, options: SelfTestOptions = {}): SelfTestReport {
  validateConfig(config);

  const { seed = 424242, crcSamples = 32, dataSamples = 64, chain = 3 } = options;
  const rng = new SeededRandom(seed);
  const step = compileStepFunction(config);
  const crcAllOnes = crcMask(config.crcBits);
  const dataAllOnes = crcMask(config.dataBits);
  const dataCount = dataAllOnes + 1n < BigInt(dataSamples) ? Number(dataAllOnes + 1n) : dataSamples;

  let checked = 0;
  for (let i = 0; i < crcSamples; i++) {
    let crc = pick(i, crcAllOnes, rng);
    for (let j = 0; j < dataCount; j++) {
      let data = pick(j, dataAllOnes, rng);
      for (let k = 0; k < chain; k++) {
        const expected = crcReference(crc, data, config);
        const actual = step(crc, data);
        if (actual !== expected) {
          throw CrcGenError.selfTestMismatch(
            `P=${formatHex(config.polynomial)}, nrCrcBits=${config.crcBits}, ` +
              `shiftRight=${config.shiftRight ? 1 : 0}, nrDataBits=${config.dataBits}, ` +
              `crc=${formatHex(crc)}, data=${formatHex(data)}, ` +
              `ref=${formatHex(expected)}, generated=${formatHex(actual)}, seed=${rng.getSeed()}`
          );
        }
        checked++;
        crc = expected;
        data = (data + 1n) & dataAllOnes;
      }
    }
  }

  return { config, seed: rng.getSeed(), checked };
}

/**
 * First sample is zero, second all-ones, the rest random in between.
 */
function pick(sample: number, allOnes: bigint, rng: SeededRandom): bigint {
  if (sample === 0) return 0n;
  if (sample === 1) return allOnes;
  return allOnes > 1n ? rng.bigintBetween(1n, allOnes - 1n) : rng.bigint(1);
}

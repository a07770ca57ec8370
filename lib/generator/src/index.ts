/**
 * crcforge generator
 *
 * Unrolls a CRC shift register into one closed-form XOR expression per output
 * bit, simplifies it and renders it as software or hardware description code.
 */

// Main generator
export { CrcGenerator, createGenerator } from "./generator.js";
export { type GeneratorConfig, defaultConfig, mergeConfig, validateConfig, crcMask } from "./config.js";
export { unrollRegister } from "./unroll.js";

// Diagnostic
export { CrcGenError, ErrorCode } from "./diagnostic/index.js";

// IR
export {
  type InputSource,
  type BitExpr,
  type InputBit,
  type ConstBit,
  type XorExpr,
  inputBit,
  constBit,
  xor,
  bitExprEquals,
  bitIdentity,
  sortKey,
  compareSortKeys,
  nodeCount,
  Word,
} from "./ir/index.js";

// Simplifier
export { Optimize, simplify, flatten, flattenOperands, eliminate, type EliminateOptions } from "./optimize/index.js";

// Code generation
export {
  TARGETS,
  type Target,
  type CodegenOptions,
  type GeneratedFile,
  type ExprRenderer,
  type Naming,
  isTarget,
  parseTarget,
  generate,
  defaultNaming,
  renderExpr,
  describeAlgorithm,
} from "./codegen/index.js";

// Polynomials and presets
export { bitReverse, polyToInt, intToPoly, formatHex } from "./polynomial.js";
export {
  type CrcParameters,
  type ParameterOverrides,
  CRC_PARAMETERS,
  DEFAULT_ALGORITHM,
  listPresets,
  getPreset,
  resolveParameters,
} from "./parameters.js";

// Verification
export { type ReferenceParams, type BlockOptions, crcReference, crcReferenceBlock } from "./reference.js";
export {
  type CrcStepFunction,
  type SelfTestOptions,
  type SelfTestReport,
  compileStepFunction,
  runSelfTest,
} from "./selftest.js";

/**
 * Generator configuration.
 */

import { CrcGenError } from "./diagnostic/index.js";
import { Optimize } from "./optimize/index.js";

/**
 * Configuration for one generation run.
 */
export interface GeneratorConfig {
  /** Polynomial coefficients without the implicit leading x^crcBits term. */
  polynomial: bigint;

  /** CRC register width in bits. */
  crcBits: number;

  /** Input data word width in bits. */
  dataBits: number;

  /** Shift direction: right (LSB first, little endian) or left (MSB first, big endian). */
  shiftRight: boolean;

  /** Optimizer step flags (see {@link Optimize}). */
  optimize: number;
}

/**
 * Creates default generator configuration (CRC-32).
 */
export function defaultConfig(): GeneratorConfig {
  return {
    polynomial: 0xedb88320n,
    crcBits: 32,
    dataBits: 8,
    shiftRight: true,
    optimize: Optimize.ALL,
  };
}

/**
 * Merges partial config with defaults.
 */
export function mergeConfig(partial: Partial<GeneratorConfig>): GeneratorConfig {
  return {
    ...defaultConfig(),
    ...partial,
  };
}

/**
 * Rejects configurations that cannot be unrolled.
 */
export function validateConfig(config: GeneratorConfig): void {
  if (!Number.isInteger(config.crcBits) || config.crcBits < 1) {
    throw CrcGenError.invalidCrcWidth(config.crcBits);
  }
  if (!Number.isInteger(config.dataBits) || config.dataBits < 1) {
    throw CrcGenError.invalidDataWidth(config.dataBits);
  }
  if (config.polynomial < 0n || config.polynomial > crcMask(config.crcBits)) {
    throw CrcGenError.polynomialTooWide(config.polynomial, config.crcBits);
  }
  if (!Number.isInteger(config.optimize) || config.optimize < Optimize.NONE || config.optimize > Optimize.ALL) {
    throw CrcGenError.invalidOptimizeFlags(config.optimize);
  }
}

/**
 * All-ones mask of the given width.
 */
export function crcMask(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

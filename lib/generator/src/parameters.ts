/**
 * Named CRC parameter presets and configuration construction.
 */

import { mergeConfig, validateConfig, type GeneratorConfig } from "./config.js";
import { CrcGenError } from "./diagnostic/index.js";
import { polyToInt } from "./polynomial.js";

/**
 * Parameters of a named CRC standard.
 */
export interface CrcParameters {
  readonly polynomial: bigint;
  readonly crcBits: number;
  readonly shiftRight: boolean;
}

export const CRC_PARAMETERS: Readonly<Record<string, CrcParameters>> = Object.freeze({
  "CRC-64-ECMA": { polynomial: 0xc96c5795d7870f42n, crcBits: 64, shiftRight: true },
  "CRC-64-ISO": { polynomial: 0xd800000000000000n, crcBits: 64, shiftRight: true },
  "CRC-32": { polynomial: 0xedb88320n, crcBits: 32, shiftRight: true },
  "CRC-16": { polynomial: 0xa001n, crcBits: 16, shiftRight: true },
  "CRC-16-CCITT": { polynomial: 0x1021n, crcBits: 16, shiftRight: false },
  "CRC-8-CCITT": { polynomial: 0x07n, crcBits: 8, shiftRight: false },
  "CRC-8-IBUTTON": { polynomial: 0x8cn, crcBits: 8, shiftRight: true },
  "CRC-6-ITU": { polynomial: 0x03n, crcBits: 6, shiftRight: false },
});

export const DEFAULT_ALGORITHM = "CRC-32";

/**
 * Names of all presets.
 */
export function listPresets(): string[] {
  return Object.keys(CRC_PARAMETERS);
}

/**
 * Looks up a preset by name.
 */
export function getPreset(name: string): CrcParameters {
  const preset = Object.hasOwn(CRC_PARAMETERS, name) ? CRC_PARAMETERS[name] : undefined;
  if (!preset) {
    throw CrcGenError.unknownAlgorithm(name, listPresets());
  }
  return preset;
}

/**
 * A preset name plus individual overrides.
 */
export interface ParameterOverrides {
  algorithm?: string;
  /** Polynomial as hex, decimal or coefficient string. */
  polynomial?: string;
  crcBits?: number;
  dataBits?: number;
  shiftRight?: boolean;
  optimize?: number;
}

/**
 * Builds a validated configuration from a preset and overrides.
 *
 * A coefficient-string polynomial is interpreted with the resolved width and
 * shift direction, so it is bit-reversed for right shifting CRCs.
 */
export function resolveParameters(overrides: ParameterOverrides = {}): GeneratorConfig {
  const preset = getPreset(overrides.algorithm ?? DEFAULT_ALGORITHM);

  const crcBits = overrides.crcBits ?? preset.crcBits;
  const shiftRight = overrides.shiftRight ?? preset.shiftRight;

  let polynomial = preset.polynomial;
  if (overrides.polynomial !== undefined) {
    polynomial = overrides.polynomial.includes("^")
      ? polyToInt(overrides.polynomial, crcBits, shiftRight)
      : parseInteger(overrides.polynomial);
  }

  const config = mergeConfig({
    polynomial,
    crcBits,
    shiftRight,
    ...(overrides.dataBits !== undefined && { dataBits: overrides.dataBits }),
    ...(overrides.optimize !== undefined && { optimize: overrides.optimize }),
  });
  validateConfig(config);
  return config;
}

/**
 * Parses a plain hex or decimal integer without masking.
 */
function parseInteger(text: string): bigint {
  const trimmed = text.trim().toLowerCase();
  if (/^0x[0-9a-f]+$/.test(trimmed) || /^[0-9]+$/.test(trimmed)) {
    return BigInt(trimmed);
  }
  throw CrcGenError.invalidPolynomial(text);
}

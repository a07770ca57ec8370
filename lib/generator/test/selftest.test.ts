/**
 * Self-test tests: generated code compiled in process.
 */

import { describe, expect, it } from "vitest";
import { mergeConfig } from "../src/config.js";
import { getPreset } from "../src/parameters.js";
import { SeededRandom } from "../src/random.js";
import { compileStepFunction, runSelfTest } from "../src/selftest.js";
import { bytes } from "./setup/evaluate.js";

function presetConfig(name: string) {
  const preset = getPreset(name);
  return mergeConfig({
    polynomial: preset.polynomial,
    crcBits: preset.crcBits,
    shiftRight: preset.shiftRight,
    dataBits: 8,
  });
}

describe("compileStepFunction", () => {
  it("produces a callable CRC-32 step", () => {
    const step = compileStepFunction(presetConfig("CRC-32"));
    let crc = 0xffffffffn;
    for (const byte of bytes("123456789")) {
      crc = step(crc, byte);
    }
    expect(crc ^ 0xffffffffn).toBe(0xcbf43926n);
  });

  it("handles registers wider than 64 bits", () => {
    const config = mergeConfig({ polynomial: 0x3n, crcBits: 80, dataBits: 4, shiftRight: false });
    const step = compileStepFunction(config);
    expect(step(0n, 0n)).toBe(0n);
    expect(step(1n << 79n, 0n)).toBe(0x3n << 3n);
  });
});

describe("runSelfTest", () => {
  it("counts every compared step", () => {
    const report = runSelfTest(presetConfig("CRC-8-CCITT"));
    expect(report.checked).toBe(32 * 64 * 3);
  });

  it("reports the seed of its input sequence", () => {
    const config = presetConfig("CRC-6-ITU");
    expect(runSelfTest(config, { crcSamples: 2, dataSamples: 2, chain: 1 }).seed).toBe(424242);
    expect(runSelfTest(config, { seed: 17, crcSamples: 2, dataSamples: 2, chain: 1 })).toEqual({
      config,
      seed: 17,
      checked: 4,
    });
  });

  it("caps data samples at the number of distinct data words", () => {
    const config = mergeConfig({ polynomial: 0x07n, crcBits: 8, dataBits: 2, shiftRight: false });
    expect(runSelfTest(config).checked).toBe(32 * 4 * 3);
  });

  it.each(["CRC-64-ECMA", "CRC-16", "CRC-16-CCITT", "CRC-6-ITU"])("passes for %s", (name) => {
    const report = runSelfTest(presetConfig(name), { crcSamples: 6, dataSamples: 16, chain: 2 });
    expect(report.checked).toBe(6 * 16 * 2);
  });

  it("passes for one-bit registers and unoptimized words", () => {
    expect(runSelfTest(mergeConfig({ polynomial: 1n, crcBits: 1, dataBits: 1 })).checked).toBe(32 * 2 * 3);
    const raw = mergeConfig({ polynomial: 0x07n, crcBits: 8, dataBits: 3, shiftRight: false, optimize: 0 });
    expect(runSelfTest(raw, { crcSamples: 8 }).checked).toBe(8 * 8 * 3);
  });
});

describe("SeededRandom", () => {
  it("repeats its sequence for the same seed", () => {
    const a = new SeededRandom(7);
    const b = new SeededRandom(7);
    expect([a.nextBits(), a.nextBits(), a.nextBits()]).toEqual([b.nextBits(), b.nextBits(), b.nextBits()]);
    expect(a.getSeed()).toBe(7);
  });

  it("diverges for different seeds", () => {
    expect(new SeededRandom(1).nextBits()).not.toBe(new SeededRandom(2).nextBits());
  });

  it("stays inside the requested range", () => {
    const rng = new SeededRandom(99);
    for (let i = 0; i < 200; i++) {
      const value = rng.bigintBetween(3n, 9n);
      expect(value >= 3n && value <= 9n).toBe(true);
      expect(rng.bigint(5) < 32n).toBe(true);
    }
  });
});

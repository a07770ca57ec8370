/**
 * E2E tests for the CLI commands.
 */

import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseArgs } from "../../src/cli/args.js";
import { convert, convertPolynomial } from "../../src/cli/commands/convert.js";
import { generate } from "../../src/cli/commands/generate.js";
import { formatPresets } from "../../src/cli/commands/presets.js";
import { test as selfTest } from "../../src/cli/commands/test.js";
import { CrcGenError, ErrorCode } from "../../lib/generator/src/index.js";

function generateOptions(argv: string[]) {
  const command = parseArgs(["generate", ...argv]);
  if (command.type !== "generate") {
    throw new Error(`expected a generate command, got ${command.type}`);
  }
  return command;
}

describe("E2E: commands", () => {
  const stdout = () => vi.mocked(console.log);
  const stderr = () => vi.mocked(console.error);

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("generate", () => {
    it("prints code for a preset to stdout", async () => {
      const { target, options } = generateOptions(["verilog-module", "-a", "CRC-8-CCITT", "-n", "crc8"]);
      await generate(target, options);

      expect(process.exitCode).toBeUndefined();
      expect(stdout()).toHaveBeenCalledTimes(1);
      const lines = String(stdout().mock.calls[0]?.[0]).split("\n");
      expect(lines).toContain("module crc8 (");
      expect(lines).toContain(
        "    assign crcOut[7] = (crcIn[5] ^ crcIn[6] ^ crcIn[7] ^ data[5] ^ data[6] ^ data[7]);"
      );
    });

    it("takes a coefficient polynomial with explicit width and direction", async () => {
      const { target, options } = generateOptions(["c", "-P", "x^8 + x^2 + x + 1", "-B", "8", "-L", "-S"]);
      await generate(target, options);

      const lines = String(stdout().mock.calls[0]?.[0]).split("\n");
      expect(lines).toContain("static uint8_t crc(uint8_t crcIn, uint8_t data)");
      expect(lines).toContain("// CRC polynomial coefficients: x^8 + x^2 + x + 1");
    });

    it("warns when C-only flags are given for another target", async () => {
      const { target, options } = generateOptions(["python", "-a", "CRC-8-CCITT", "-S", "-I"]);
      await generate(target, options);

      expect(process.exitCode).toBeUndefined();
      expect(stdout()).toHaveBeenCalledTimes(1);
      expect(stderr()).toHaveBeenCalledWith(
        expect.stringContaining("-S|--static and -I|--inline only apply to the c target, ignored for python")
      );
    });

    it("does not warn about C-only flags for the c target", async () => {
      const { target, options } = generateOptions(["c", "-a", "CRC-8-CCITT", "-I"]);
      await generate(target, options);

      expect(stderr()).not.toHaveBeenCalled();
      expect(String(stdout().mock.calls[0]?.[0]).split("\n")).toContain(
        "inline uint8_t crc(uint8_t crcIn, uint8_t data)"
      );
    });

    it("reports unknown targets and sets the exit code", async () => {
      const { options } = generateOptions([]);
      await generate("cobol", options);

      expect(process.exitCode).toBe(1);
      expect(stdout()).not.toHaveBeenCalled();
      expect(stderr()).toHaveBeenCalledWith(
        expect.stringContaining(`error[${ErrorCode.UNKNOWN_TARGET}]: Unknown output target: cobol`)
      );
    });

    it("reports backend width limits", async () => {
      const { target, options } = generateOptions(["c", "-P", "0x1", "-B", "72"]);
      await generate(target, options);

      expect(process.exitCode).toBe(1);
      expect(stderr()).toHaveBeenCalledWith(expect.stringContaining(ErrorCode.UNSUPPORTED_BACKEND_WIDTH));
    });

    describe("with --file", () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "crcforge-cli-"));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it("writes the file instead of printing", async () => {
        const outPath = join(dir, "crc16.vhd");
        const { target, options } = generateOptions(["vhdl", "-a", "CRC-16", "-n", "crc16", "-f", outPath]);
        await generate(target, options);

        expect(stdout()).not.toHaveBeenCalled();
        const lines = (await readFile(outPath, "utf-8")).split("\n");
        expect(lines).toContain("entity crc16 is");
        expect(lines).toContain("-- CRC polynomial coefficients: x^16 + x^15 + x^2 + 1");
      });
    });
  });

  describe("convert", () => {
    it("converts coefficient strings to hex", () => {
      expect(convertPolynomial("x^16 + x^12 + x^5 + 1", { crcBits: 16, shiftRight: false })).toBe("0x1021");
      expect(convertPolynomial("x^16 + x^12 + x^5 + 1", { crcBits: 16, shiftRight: true })).toBe("0x8408");
    });

    it("converts integers to coefficient strings", () => {
      expect(convertPolynomial("0x1021", { crcBits: 16, shiftRight: false })).toBe("x^16 + x^12 + x^5 + 1");
      expect(convertPolynomial("0x8408", { crcBits: 16, shiftRight: true })).toBe("x^16 + x^12 + x^5 + 1");
      expect(convertPolynomial("4129", { crcBits: 16, shiftRight: false })).toBe("x^16 + x^12 + x^5 + 1");
    });

    it("requires a width", () => {
      expect(() => convertPolynomial("0x7", { shiftRight: false })).toThrow("-B|--crc-bits is required for convert");
      expect(() => convertPolynomial("0x7", { crcBits: 0, shiftRight: false })).toThrow(CrcGenError);
    });

    it("prints the result or the error", async () => {
      await convert("0x7", { crcBits: 8, shiftRight: false });
      expect(stdout()).toHaveBeenCalledWith("x^8 + x^2 + x + 1");

      await convert("seven", { crcBits: 8, shiftRight: false });
      expect(process.exitCode).toBe(1);
      expect(stderr()).toHaveBeenCalledWith(expect.stringContaining(ErrorCode.INVALID_POLYNOMIAL));
    });
  });

  describe("presets", () => {
    it("aligns one line per preset", () => {
      const lines = formatPresets();
      expect(lines).toHaveLength(8);
      expect(lines).toContain("CRC-8-CCITT     8 bits  left   0x7  x^8 + x^2 + x + 1");
      expect(lines).toContain("CRC-16         16 bits  right  0xA001  x^16 + x^15 + x^2 + 1");
    });
  });

  describe("test", () => {
    it("reports the number of compared steps", async () => {
      await selfTest({ algorithm: "CRC-8-CCITT", dataBits: 4, optimize: 7 });

      expect(process.exitCode).toBeUndefined();
      expect(stderr()).toHaveBeenCalledWith(expect.stringContaining(`Compared ${32 * 16 * 3} CRC steps with the reference`));
      expect(stderr()).toHaveBeenCalledWith(expect.stringContaining("Input seed 424242"));
    });

    it("fails on an invalid configuration", async () => {
      await selfTest({ algorithm: "CRC-99", dataBits: 8, optimize: 7 });

      expect(process.exitCode).toBe(1);
      expect(stderr()).toHaveBeenCalledWith(expect.stringContaining(ErrorCode.UNKNOWN_ALGORITHM));
    });
  });
});

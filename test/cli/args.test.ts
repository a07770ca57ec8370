/**
 * CLI argument parsing tests.
 */

import { describe, expect, it } from "vitest";
import { DEFAULTS, getHelpText, parseArgs, parseInteger, TARGET_NAMES } from "../../src/cli/args.js";
import { TARGETS } from "../../lib/generator/src/index.js";

describe("parseArgs", () => {
  it("shows help without arguments or with -h", () => {
    expect(parseArgs([])).toEqual({ type: "help" });
    expect(parseArgs(["--help"])).toEqual({ type: "help" });
    expect(parseArgs(["help"])).toEqual({ type: "help" });
  });

  it("shows the version", () => {
    expect(parseArgs(["-v"])).toEqual({ type: "version" });
  });

  it("reports unknown commands", () => {
    expect(parseArgs(["frob"])).toEqual({ type: "unknown", command: "frob" });
  });

  it("fills generate defaults and skips flag values when looking for the target", () => {
    expect(parseArgs(["generate", "-a", "CRC-16", "vhdl"])).toEqual({
      type: "generate",
      target: "vhdl",
      options: {
        algorithm: "CRC-16",
        polynomial: undefined,
        crcBits: undefined,
        dataBits: DEFAULTS.dataBits,
        shiftRight: undefined,
        optimize: DEFAULTS.optimize,
        name: "crc",
        dataParam: "data",
        crcInParam: "crcIn",
        crcOutParam: "crcOut",
        static: false,
        inline: false,
        file: undefined,
      },
    });
  });

  it("reads short, long and inline flag values", () => {
    const command = parseArgs([
      "generate",
      "c",
      "--data-bits=16",
      "-R",
      "-S",
      "-I",
      "-n",
      "crc16",
      "-O",
      "0x3",
      "--polynomial",
      "x^16 + x^12 + x^5 + 1",
      "-B",
      "16",
      "-f",
      "out/crc16.h",
    ]);
    expect(command).toMatchObject({
      type: "generate",
      target: "c",
      options: {
        dataBits: 16,
        shiftRight: true,
        static: true,
        inline: true,
        name: "crc16",
        optimize: 3,
        polynomial: "x^16 + x^12 + x^5 + 1",
        crcBits: 16,
        file: "out/crc16.h",
      },
    });
  });

  it("selects left shift with -L", () => {
    expect(parseArgs(["test", "-L"])).toMatchObject({ type: "test", options: { shiftRight: false } });
  });

  it("parses convert", () => {
    expect(parseArgs(["convert", "-B", "16", "x^16 + 1", "-R"])).toEqual({
      type: "convert",
      polynomial: "x^16 + 1",
      options: { crcBits: 16, shiftRight: true },
    });
  });

  it("rejects conflicting shift directions", () => {
    expect(() => parseArgs(["test", "-R", "-L"])).toThrow(
      "-R|--shift-right and -L|--shift-left are mutually exclusive"
    );
  });

  it("rejects a value flag without its value", () => {
    expect(() => parseArgs(["generate", "c", "-a", "CRC-8-CCITT", "-P"])).toThrow("Missing value for --polynomial");
    expect(() => parseArgs(["generate", "c", "-b"])).toThrow("Missing value for --data-bits");
    expect(() => parseArgs(["convert", "0x7", "--crc-bits"])).toThrow("Missing value for --crc-bits");
  });

  it("rejects malformed integers", () => {
    expect(() => parseArgs(["test", "-b", "abc"])).toThrow("Invalid -b|--data-bits argument: 'abc'");
  });
});

describe("parseInteger", () => {
  it("reads hex and signed decimal", () => {
    expect(parseInteger("0x1F", "-O")).toBe(31);
    expect(parseInteger(" 12 ", "-O")).toBe(12);
    expect(parseInteger("-3", "-B")).toBe(-3);
  });

  it("rejects everything else", () => {
    expect(() => parseInteger("1.5", "-B")).toThrow("Invalid -B argument: '1.5'");
    expect(() => parseInteger("0x", "-B")).toThrow();
  });
});

describe("help", () => {
  it("lists every target", () => {
    expect([...TARGET_NAMES].sort()).toEqual(Object.keys(TARGETS).sort());
    expect(getHelpText()).toContain(`generate <target>     Generate CRC code (${TARGET_NAMES.join(", ")})`);
  });
});

/**
 * CLI argument parsing framework.
 *
 * Provides typed argument parsing with short flags, defaults, and help generation.
 */

export const DEFAULTS = {
  algorithm: "CRC-32",
  dataBits: 8,
  name: "crc",
  dataParam: "data",
  crcInParam: "crcIn",
  crcOutParam: "crcOut",
  optimize: 7,
} as const;

export const TARGET_NAMES = [
  "c",
  "python",
  "verilog-function",
  "verilog-module",
  "vhdl",
  "myhdl",
  "typescript",
  "javascript",
] as const;

// Command types
export type Command =
  | { type: "help" }
  | { type: "version" }
  | { type: "generate"; target: string; options: GenerateOptions }
  | { type: "convert"; polynomial: string; options: ConvertOptions }
  | { type: "test"; options: AlgorithmOptions }
  | { type: "presets" }
  | { type: "unknown"; command: string };

/**
 * Options selecting the CRC algorithm. Unset fields come from the preset.
 */
export interface AlgorithmOptions {
  algorithm: string;
  polynomial?: string;
  crcBits?: number;
  dataBits: number;
  shiftRight?: boolean;
  optimize: number;
}

export interface GenerateOptions extends AlgorithmOptions {
  name: string;
  dataParam: string;
  crcInParam: string;
  crcOutParam: string;
  static: boolean;
  inline: boolean;
  file?: string;
}

export interface ConvertOptions {
  crcBits?: number;
  shiftRight: boolean;
}

// Flags that consume the following argument as their value.
const VALUE_FLAGS = new Set([
  "-a", "--algorithm",
  "-P", "--polynomial",
  "-B", "--crc-bits",
  "-b", "--data-bits",
  "-n", "--name",
  "-D", "--data-param",
  "-C", "--crc-in-param",
  "-o", "--crc-out-param",
  "-O", "--optimize",
  "-f", "--file",
]);

/**
 * Parse command line arguments into a typed Command.
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): Command {
  if (argv.length === 0 || argv[0] === "-h" || argv[0] === "--help") {
    return { type: "help" };
  }

  if (argv[0] === "-v" || argv[0] === "--version") {
    return { type: "version" };
  }

  const command = argv[0];
  const args = argv.slice(1);

  switch (command) {
    case "generate":
      return {
        type: "generate",
        target: getPositional(args) ?? "",
        options: parseGenerateOptions(args),
      };
    case "convert":
      return {
        type: "convert",
        polynomial: getPositional(args) ?? "",
        options: {
          crcBits: getIntFlag(args, "crc-bits", "B"),
          shiftRight: hasFlag(args, "shift-right", "R"),
        },
      };
    case "test":
      return { type: "test", options: parseAlgorithmOptions(args) };
    case "presets":
      return { type: "presets" };
    case "help":
      return { type: "help" };
    default:
      return { type: "unknown", command: command ?? "" };
  }
}

/**
 * Parse a flag value from args, supporting both --flag value and --flag=value.
 */
function getFlag(args: string[], long: string, short?: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // --flag=value
    if (arg?.startsWith(`--${long}=`)) {
      return arg.slice(`--${long}=`.length);
    }

    // --flag value
    if (arg === `--${long}` || (short && arg === `-${short}`)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value for --${long}`);
      }
      return value;
    }
  }
  return undefined;
}

/**
 * Check if a boolean flag is present.
 */
function hasFlag(args: string[], long: string, short?: string): boolean {
  return args.some((arg) => arg === `--${long}` || (short !== undefined && arg === `-${short}`));
}

/**
 * Get positional argument (first arg that is neither a flag nor a flag's value).
 */
function getPositional(args: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith("-")) {
      return arg;
    }
  }
  return undefined;
}

/**
 * Parses a decimal or 0x-prefixed hex integer.
 */
export function parseInteger(value: string, flag: string): number {
  const trimmed = value.trim().toLowerCase();
  const parsed = trimmed.startsWith("0x")
    ? /^0x[0-9a-f]+$/.test(trimmed) ? parseInt(trimmed.slice(2), 16) : NaN
    : /^-?[0-9]+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid ${flag} argument: '${value}'`);
  }
  return parsed;
}

function getIntFlag(args: string[], long: string, short: string): number | undefined {
  const value = getFlag(args, long, short);
  return value === undefined ? undefined : parseInteger(value, `-${short}|--${long}`);
}

function parseAlgorithmOptions(args: string[]): AlgorithmOptions {
  const right = hasFlag(args, "shift-right", "R");
  const left = hasFlag(args, "shift-left", "L");
  if (right && left) {
    throw new Error("-R|--shift-right and -L|--shift-left are mutually exclusive");
  }

  return {
    algorithm: getFlag(args, "algorithm", "a") ?? DEFAULTS.algorithm,
    polynomial: getFlag(args, "polynomial", "P"),
    crcBits: getIntFlag(args, "crc-bits", "B"),
    dataBits: getIntFlag(args, "data-bits", "b") ?? DEFAULTS.dataBits,
    shiftRight: right ? true : left ? false : undefined,
    optimize: getIntFlag(args, "optimize", "O") ?? DEFAULTS.optimize,
  };
}

function parseGenerateOptions(args: string[]): GenerateOptions {
  return {
    ...parseAlgorithmOptions(args),
    name: getFlag(args, "name", "n") ?? DEFAULTS.name,
    dataParam: getFlag(args, "data-param", "D") ?? DEFAULTS.dataParam,
    crcInParam: getFlag(args, "crc-in-param", "C") ?? DEFAULTS.crcInParam,
    crcOutParam: getFlag(args, "crc-out-param", "o") ?? DEFAULTS.crcOutParam,
    static: hasFlag(args, "static", "S"),
    inline: hasFlag(args, "inline", "I"),
    file: getFlag(args, "file", "f"),
  };
}

/**
 * Generate help text for the CLI.
 */
export function getHelpText(): string {
  return `
crcforge - Combinatorial CRC code generator

Usage:
  crcforge <command> [options]

Commands:
  generate <target>     Generate CRC code (${TARGET_NAMES.join(", ")})
  convert <polynomial>  Convert a polynomial from string to int or vice versa
  test                  Cross-check generated code against the reference CRC
  presets               List the named CRC algorithms

Algorithm Options:
  -a, --algorithm       Named CRC algorithm (default: ${DEFAULTS.algorithm})
  -P, --polynomial      CRC polynomial (hex, decimal or "x^8 + x^2 + x + 1")
  -B, --crc-bits        Number of CRC bits
  -b, --data-bits       Number of input data word bits (default: ${DEFAULTS.dataBits})
  -R, --shift-right     CRC algorithm shift direction: right shift
  -L, --shift-left      CRC algorithm shift direction: left shift
  -O, --optimize        Optimizer steps, any sum of 1 (flatten), 2 (eliminate)
                        and 4 (lexicographic sort); 0 disables all (default: ${DEFAULTS.optimize})

Output Options:
  -n, --name            Generated function/module name (default: ${DEFAULTS.name})
  -D, --data-param      Data parameter name (default: ${DEFAULTS.dataParam})
  -C, --crc-in-param    CRC input parameter name (default: ${DEFAULTS.crcInParam})
  -o, --crc-out-param   CRC output parameter name, modules only (default: ${DEFAULTS.crcOutParam})
  -S, --static          Generate static C function
  -I, --inline          Generate inline C function
  -f, --file            Write to a file instead of stdout
  -h, --help            Show help
  -v, --version         Show version

Examples:
  crcforge generate verilog-module -a CRC-16-CCITT
  crcforge generate c -a CRC-8-CCITT -S -I -f crc8.h
  crcforge generate vhdl -P "x^8 + x^2 + x + 1" -B 8 -L -b 16
  crcforge convert "x^16 + x^12 + x^5 + 1" -B 16
  crcforge test -a CRC-32
`;
}

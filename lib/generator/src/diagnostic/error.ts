/**
 * Generator error types.
 */

/**
 * Error codes for generator errors.
 */
export const ErrorCode = {
  // Configuration Errors
  INVALID_CRC_WIDTH: "crcforge::config::invalid_crc_width",
  INVALID_DATA_WIDTH: "crcforge::config::invalid_data_width",
  POLYNOMIAL_TOO_WIDE: "crcforge::config::polynomial_too_wide",
  INVALID_OPTIMIZE_FLAGS: "crcforge::config::invalid_optimize_flags",
  UNKNOWN_ALGORITHM: "crcforge::config::unknown_algorithm",

  // Polynomial Errors
  INVALID_POLYNOMIAL: "crcforge::polynomial::invalid_format",

  // Code Generation Errors
  UNSUPPORTED_BACKEND_WIDTH: "crcforge::codegen::unsupported_width",
  UNKNOWN_TARGET: "crcforge::codegen::unknown_target",

  // Self-test Errors
  SELF_TEST_MISMATCH: "crcforge::selftest::mismatch",

  // Internal Errors
  INTERNAL_INVARIANT: "crcforge::internal::invariant_violation",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for generator errors.
 */
export class CrcGenError extends Error {
  readonly code: ErrorCode;
  readonly help?: string;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      help?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CrcGenError";
    this.code = code;
    this.help = options?.help;
  }

  /**
   * Formats the error for display.
   */
  format(): string {
    const parts: string[] = [];

    parts.push(`error[${this.code}]: ${this.message}`);

    if (this.help) {
      parts.push("");
      parts.push(`  help: ${this.help}`);
    }

    return parts.join("\n");
  }

  /**
   * True for errors caused by caller input, false for internal bugs.
   */
  isConfigurationError(): boolean {
    return this.code.startsWith("crcforge::config::") || this.code.startsWith("crcforge::polynomial::");
  }

  // =========================================================================
  // Factory methods for specific error types
  // =========================================================================

  static invalidCrcWidth(bits: number): CrcGenError {
    return new CrcGenError(`Invalid number of CRC bits: ${bits}`, ErrorCode.INVALID_CRC_WIDTH, {
      help: "The CRC width must be a positive integer.",
    });
  }

  static invalidDataWidth(bits: number): CrcGenError {
    return new CrcGenError(`Invalid number of input data bits: ${bits}`, ErrorCode.INVALID_DATA_WIDTH, {
      help: "The input word width must be a positive integer.",
    });
  }

  static polynomialTooWide(polynomial: bigint, crcBits: number): CrcGenError {
    return new CrcGenError(
      `Invalid polynomial 0x${polynomial.toString(16).toUpperCase()}. It is bigger than the CRC width of (2**${crcBits})-1.`,
      ErrorCode.POLYNOMIAL_TOO_WIDE,
      {
        help: "Leave out the implicit leading x^width term of the polynomial.",
      }
    );
  }

  static invalidOptimizeFlags(flags: number): CrcGenError {
    return new CrcGenError(`Invalid optimizer flags: ${flags}`, ErrorCode.INVALID_OPTIMIZE_FLAGS, {
      help: "Use a sum of 1 (flatten), 2 (eliminate) and 4 (lexicographic sort), or 0 to disable all.",
    });
  }

  static unknownAlgorithm(name: string, known: readonly string[]): CrcGenError {
    return new CrcGenError(`Unknown CRC algorithm: ${name}`, ErrorCode.UNKNOWN_ALGORITHM, {
      help: `Known algorithms: ${known.join(", ")}`,
    });
  }

  static invalidPolynomial(text: string): CrcGenError {
    return new CrcGenError(`Invalid polynomial coefficient format: '${text}'`, ErrorCode.INVALID_POLYNOMIAL, {
      help: "Use hex (0x1021), decimal (4129) or coefficients (x^16 + x^12 + x^5 + 1).",
    });
  }

  static unsupportedBackendWidth(backend: string, what: string, bits: number, max: number): CrcGenError {
    return new CrcGenError(
      `${backend} code generator: ${what} sizes bigger than ${max} bit are not supported (got ${bits})`,
      ErrorCode.UNSUPPORTED_BACKEND_WIDTH
    );
  }

  static unknownTarget(target: string, known: readonly string[]): CrcGenError {
    return new CrcGenError(`Unknown output target: ${target}`, ErrorCode.UNKNOWN_TARGET, {
      help: `Known targets: ${known.join(", ")}`,
    });
  }

  static selfTestMismatch(details: string): CrcGenError {
    return new CrcGenError(`Test failed: ${details}`, ErrorCode.SELF_TEST_MISMATCH);
  }

  static invariant(message: string): CrcGenError {
    return new CrcGenError(`Internal invariant violated: ${message}`, ErrorCode.INTERNAL_INVARIANT, {
      help: "This is a bug in the generator, not in the input.",
    });
  }
}

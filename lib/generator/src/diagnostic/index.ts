/**
 * Diagnostic module - error types.
 */

export { CrcGenError, ErrorCode } from "./error.js";

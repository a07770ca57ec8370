/**
 * CLI logging utilities with consistent formatting.
 *
 * Generated code goes to stdout through `raw`; every status line goes to
 * stderr so that output can be piped into a file.
 */

import { CrcGenError } from "../../../lib/generator/src/index.js";

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";

export const logger = {
  /**
   * Logs an info message.
   */
  info(message: string): void {
    console.error(`${CYAN}info${RESET}  ${message}`);
  },

  /**
   * Logs a success message.
   */
  success(message: string): void {
    console.error(`${GREEN}done${RESET}  ${message}`);
  },

  warn(message: string): void {
    console.error(`${YELLOW}warn${RESET}  ${message}`);
  },

  error(message: string): void {
    console.error(`${RED}error${RESET} ${message}`);
  },

  /**
   * Logs a failure, with code and help text for generator errors.
   */
  failure(error: unknown): void {
    if (error instanceof CrcGenError) {
      console.error(`${RED}${error.format()}${RESET}`);
    } else {
      this.error(error instanceof Error ? error.message : String(error));
    }
  },

  /**
   * Logs a step in a process.
   */
  step(message: string): void {
    console.error(`${DIM}  >${RESET} ${message}`);
  },

  header(message: string): void {
    console.error(`\n${BOLD}${MAGENTA}${message}${RESET}\n`);
  },

  /**
   * Logs a file path.
   */
  file(path: string): void {
    console.error(`${DIM}     ${path}${RESET}`);
  },

  /**
   * Writes raw output to stdout (no formatting).
   */
  raw(message: string): void {
    console.log(message);
  },
};

/* eslint-disable no-console */
/**
 * CLI logging utility with colors and formatting.
 *
 * Command results go to stdout through `log`; everything else goes to
 * stderr, so output can be piped into jq or a file.
 */

import type { RunLogger } from '../../execution/run-logger.js';

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stderr.isTTY === true;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const BOLD = USE_COLOR ? '\x1b[1m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

export const logger = {
  info(message: string): void {
    console.error(`${BLUE}${message}${RESET}`);
  },

  success(message: string): void {
    console.error(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    console.error(`${YELLOW}⚠ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.error(`${DIM}${message}${RESET}`);
    }
  },

  /** Command output (stdout) */
  log(message: string): void {
    console.log(message);
  },

  newline(): void {
    console.error();
  },

  section(title: string): void {
    console.error();
    console.error(`${BOLD}━━━ ${title} ━━━${RESET}`);
  },
};

/** The CLI logger seen through the library's progress hook. */
export const runLogger: RunLogger = {
  info: (message) => logger.info(message),
  warn: (message) => logger.warn(message),
  debug: (message) => logger.debug(message),
};

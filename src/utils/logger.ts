/* eslint-disable no-console */
/**
 * Console logging with colors, scoped per module.
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY !== false;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Printed only when DEBUG is set. */
  debug(message: string): void;
}

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    info(message: string): void {
      console.log(`${BLUE}ℹ ${tag} ${message}${RESET}`);
    },

    warn(message: string): void {
      console.warn(`${YELLOW}⚠ ${tag} ${message}${RESET}`);
    },

    error(message: string): void {
      console.error(`${RED}✗ ${tag} ${message}${RESET}`);
    },

    debug(message: string): void {
      if (process.env.DEBUG) {
        console.log(`${DIM}🔍 ${tag} ${message}${RESET}`);
      }
    },
  };
}
